import { Test, TestingModule } from '@nestjs/testing';
import { promises as fs } from 'fs';
import path from 'path';
import { AuthenticationError, RegistrationError } from '../common/errors/wallet.errors';
import { ActionLogService } from '../common/logging/action-log.service';
import { Clock } from '../common/utils/clock';
import { ConfigModule } from '../config/config.module';
import { PersistenceService } from '../persistence/persistence.service';
import { PortfolioStoreService } from '../portfolio/portfolio-store.service';
import { FixedClock } from '../testing/fixed-clock';
import { makeDataDir, removeDataDir, testConfig } from '../testing/test-config';
import { UsersService, hashPassword } from './users.service';

describe('UsersService', () => {
  let service: UsersService;
  let portfolios: PortfolioStoreService;
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeDataDir();
    const module: TestingModule = await Test.createTestingModule({
      imports: [ConfigModule.forRoot(testConfig(dataDir))],
      providers: [
        PersistenceService,
        PortfolioStoreService,
        { provide: Clock, useValue: new FixedClock(new Date('2025-01-01T12:00:00.000Z')) },
        ActionLogService,
        UsersService,
      ],
    }).compile();

    service = module.get<UsersService>(UsersService);
    portfolios = module.get<PortfolioStoreService>(PortfolioStoreService);
  });

  afterEach(async () => {
    await removeDataDir(dataDir);
  });

  describe('hashPassword', () => {
    it('should be the hex sha256 of password followed by salt', () => {
      expect(hashPassword('', '')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
      expect(hashPassword('pa', 'ss')).toBe(hashPassword('pas', 's'));
    });
  });

  describe('register', () => {
    it('should assign sequential ids and store a salted hash', async () => {
      const alice = await service.register('alice', 'test-pass');
      const bob = await service.register('bob', 'test-pass');

      expect(alice.userId).toBe(1);
      expect(bob.userId).toBe(2);
      expect(alice.salt).toMatch(/^[0-9a-f]{16}$/);
      expect(alice.hashedPassword).toBe(hashPassword('test-pass', alice.salt));
      expect(alice.hashedPassword).not.toBe(bob.hashedPassword);
      expect(alice.registrationDate.toISOString()).toBe('2025-01-01T12:00:00.000Z');
    });

    it('should persist the documented users.json layout', async () => {
      const alice = await service.register('alice', 'test-pass');

      const raw: unknown = JSON.parse(await fs.readFile(path.join(dataDir, 'users.json'), 'utf-8'));
      expect(raw).toEqual([
        {
          user_id: 1,
          username: 'alice',
          hashed_password: alice.hashedPassword,
          salt: alice.salt,
          registration_date: '2025-01-01T12:00:00.000Z',
        },
      ]);
    });

    it('should record the registration in the action log without the password', async () => {
      await service.register(' alice ', 'test-pass');

      const content = await fs.readFile(path.join(dataDir, 'logs', 'actions.log'), 'utf-8');
      const entry: unknown = JSON.parse(content.trim());
      expect(entry).toEqual({
        level: 'info',
        time: '2025-01-01T12:00:00.000Z',
        action: 'REGISTER',
        username: 'alice',
        userId: 1,
        result: 'OK',
        msg: 'REGISTER',
      });
      expect(content).not.toContain('test-pass');
    });

    it('should open an empty portfolio', async () => {
      await service.register('alice', 'test-pass');

      const raw: unknown = JSON.parse(await fs.readFile(path.join(dataDir, 'portfolios.json'), 'utf-8'));
      expect(raw).toEqual([{ user_id: 1, wallets: {} }]);
      expect((await portfolios.load(1)).wallet.size).toBe(0);
    });

    it('should reject a taken username', async () => {
      await service.register('alice', 'test-pass');
      await expect(service.register('alice', 'other-pass')).rejects.toThrow("Username 'alice' is already taken");
    });

    it('should reject an empty username and a short password', async () => {
      await expect(service.register('   ', 'test-pass')).rejects.toThrow(RegistrationError);
      await expect(service.register('alice', 'abc')).rejects.toThrow('Password must be at least 4 characters');
    });
  });

  describe('authenticate', () => {
    beforeEach(async () => {
      await service.register('alice', 'test-pass');
    });

    it('should return the user for the right password', async () => {
      await expect(service.authenticate('alice', 'test-pass')).resolves.toMatchObject({ userId: 1, username: 'alice' });
    });

    it('should reject a wrong password', async () => {
      await expect(service.authenticate('alice', 'wrong-pass')).rejects.toThrow(AuthenticationError);
    });

    it('should reject an unknown user', async () => {
      await expect(service.authenticate('mallory', 'test-pass')).rejects.toThrow("User 'mallory' not found");
    });
  });
});
