import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { NotLoggedInError } from '../common/errors/wallet.errors';
import { ActionLogService } from '../common/logging/action-log.service';
import { PersistenceService } from '../persistence/persistence.service';
import { defineStore } from '../persistence/store-definition';
import { User } from './entities/user.entity';
import { UsersService } from './users.service';

export const SESSION_STORE = defineStore<{ user_id: number | null }>({
  id: 'session',
  fileName: 'session.json',
  schema: z.object({ user_id: z.number().int().nullable() }),
  empty: () => ({ user_id: null }),
});

// The logged-in CLI user, kept in session.json between invocations.
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    private readonly persistence: PersistenceService,
    private readonly users: UsersService,
    private readonly actions: ActionLogService,
  ) {}

  login(username: string, password: string): Promise<User> {
    return this.actions.track(
      { action: 'LOGIN', username: username.trim() },
      async () => {
        const user = await this.users.authenticate(username, password);
        await this.persistence.commit(SESSION_STORE, { user_id: user.userId });
        this.logger.log({ action: 'LOGIN', userId: user.userId });
        return user;
      },
      (user) => ({ userId: user.userId }),
    );
  }

  async logout(): Promise<void> {
    const { user_id } = await this.persistence.load(SESSION_STORE);
    await this.persistence.commit(SESSION_STORE, { user_id: null });
    this.actions.record({ action: 'LOGOUT', userId: user_id ?? undefined, result: 'OK' });
  }

  /** Undefined when nobody is logged in or the stored user no longer exists */
  async currentUser(): Promise<User | undefined> {
    const { user_id } = await this.persistence.load(SESSION_STORE);
    return user_id === null ? undefined : this.users.findById(user_id);
  }

  async requireUser(): Promise<User> {
    const user = await this.currentUser();
    if (!user) {
      throw new NotLoggedInError();
    }
    return user;
  }
}
