import { Injectable, Logger } from '@nestjs/common';
import { createHash, randomBytes, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { AuthenticationError, RegistrationError } from '../common/errors/wallet.errors';
import { ActionLogService } from '../common/logging/action-log.service';
import { Clock } from '../common/utils/clock';
import { PersistenceService } from '../persistence/persistence.service';
import { defineStore } from '../persistence/store-definition';
import { PortfolioStoreService } from '../portfolio/portfolio-store.service';
import { User } from './entities/user.entity';

const MIN_PASSWORD_LENGTH = 4;

const storedUserSchema = z.object({
  user_id: z.number().int().positive(),
  username: z.string().min(1),
  hashed_password: z.string(),
  salt: z.string(),
  registration_date: z.string(),
});

type StoredUser = z.infer<typeof storedUserSchema>;

export const USERS_STORE = defineStore<StoredUser[]>({
  id: 'users',
  fileName: 'users.json',
  schema: z.array(storedUserSchema),
  empty: () => [],
});

export function hashPassword(password: string, salt: string): string {
  return createHash('sha256').update(password + salt).digest('hex');
}

function fromStored(stored: StoredUser): User {
  return {
    userId: stored.user_id,
    username: stored.username,
    hashedPassword: stored.hashed_password,
    salt: stored.salt,
    registrationDate: new Date(stored.registration_date),
  };
}

// Accounts in users.json. Registration also opens the user's empty portfolio.
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private readonly persistence: PersistenceService,
    private readonly portfolios: PortfolioStoreService,
    private readonly clock: Clock,
    private readonly actions: ActionLogService,
  ) {}

  /**
   * Creates the account with the next sequential id.
   * @throws RegistrationError for an empty or taken username or a short password
   */
  register(username: string, password: string): Promise<User> {
    return this.actions.track(
      { action: 'REGISTER', username: username.trim() },
      () => this.createAccount(username, password),
      (user) => ({ userId: user.userId }),
    );
  }

  private async createAccount(username: string, password: string): Promise<User> {
    const name = username.trim();
    if (!name) {
      throw new RegistrationError('Username must not be empty');
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new RegistrationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
    }

    const salt = randomBytes(8).toString('hex');

    const users = await this.persistence.update(USERS_STORE, (current) => {
      if (current.some((u) => u.username === name)) {
        throw new RegistrationError(`Username '${name}' is already taken`);
      }
      return [
        ...current,
        {
          user_id: current.reduce((max, u) => Math.max(max, u.user_id), 0) + 1,
          username: name,
          hashed_password: hashPassword(password, salt),
          salt,
          registration_date: this.clock.now().toISOString(),
        },
      ];
    });

    const created = users.find((u) => u.username === name);
    if (!created) {
      throw new RegistrationError(`Could not register '${name}'`);
    }
    await this.portfolios.create(created.user_id);
    this.logger.log({ action: 'REGISTER', userId: created.user_id, username: name });
    return fromStored(created);
  }

  /** @throws AuthenticationError for an unknown user or a wrong password */
  async authenticate(username: string, password: string): Promise<User> {
    const user = await this.findByUsername(username.trim());
    if (!user) {
      throw new AuthenticationError(`User '${username.trim()}' not found`);
    }
    const expected = Buffer.from(user.hashedPassword, 'hex');
    const actual = Buffer.from(hashPassword(password, user.salt), 'hex');
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      throw new AuthenticationError('Wrong password');
    }
    return user;
  }

  async findById(userId: number): Promise<User | undefined> {
    const users = await this.persistence.load(USERS_STORE);
    const stored = users.find((u) => u.user_id === userId);
    return stored ? fromStored(stored) : undefined;
  }

  async findByUsername(username: string): Promise<User | undefined> {
    const users = await this.persistence.load(USERS_STORE);
    const stored = users.find((u) => u.username === username);
    return stored ? fromStored(stored) : undefined;
  }
}
