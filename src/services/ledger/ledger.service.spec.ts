import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { LedgerService } from './ledger.service';
import { generateUserKey } from './user-key';
import { LedgerStore } from '../ledger-store/ledger-store';
import { InMemoryLedgerStore } from '../ledger-store/in-memory-ledger-store.service';
import { RedisLockService } from '../redis-lock/redis-lock.service';
import { Principal } from '../../auth/interfaces/principal.interface';
import { UserKind } from '../../common/enums/user-kind.enum';
import { InactiveUserException } from '../../common/exceptions/ledger.exceptions';

jest.mock('./user-key', () => ({
  generateUserKey: jest.fn(),
}));

describe('LedgerService', () => {
  let service: LedgerService;
  let store: LedgerStore;
  let keyCounter: number;

  const mockGenerateUserKey = jest.mocked(generateUserKey);

  const mockRedisLockService = {
    withLocks: jest.fn((_keys: string[], fn: () => Promise<unknown>) => fn()),
  };

  const mockConfigService = {
    get: jest.fn((key: string, defaultValue?: unknown) => {
      const values: Record<string, unknown> = {
        'auth.memberGroup': 'drinks',
        'auth.adminGroup': 'drinks-admin',
        'ledger.activateNewPostpaidUsers': false,
        'ledger.userKeyBytes': 6,
      };
      return key in values ? values[key] : defaultValue;
    }),
  };

  const admin: Principal = { username: 'admin', groups: ['drinks-admin'], kind: UserKind.POSTPAID };
  const alice: Principal = { username: 'alice', groups: ['drinks'], kind: UserKind.POSTPAID };
  const bob: Principal = { username: 'bob', groups: ['drinks'], kind: UserKind.POSTPAID };
  const guest: Principal = { username: 'guest', groups: [], kind: UserKind.POSTPAID };

  const seedPostpaid = (username: string, money: number, activated = true) =>
    store.upsertPostpaid({ username, money, activated, lastDrink: null });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LedgerService,
        { provide: LedgerStore, useClass: InMemoryLedgerStore },
        { provide: RedisLockService, useValue: mockRedisLockService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<LedgerService>(LedgerService);
    store = module.get(LedgerStore);

    keyCounter = 0;
    mockGenerateUserKey.mockImplementation(() => {
      keyCounter += 1;
      return `key-${keyCounter}`;
    });

    await seedPostpaid('admin', 1000);
    await seedPostpaid('alice', 0);
    await seedPostpaid('bob', 0);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('ensurePostpaidUser', () => {
    it('should create a deactivated user on first login', async () => {
      const created = await service.ensurePostpaidUser('carol');

      expect(created).toMatchObject({
        username: 'carol',
        money: 0,
        activated: false,
        lastDrink: null,
      });
    });

    it('should return the existing user on later logins', async () => {
      const first = await service.ensurePostpaidUser('carol');
      const second = await service.ensurePostpaidUser('carol');

      expect(second.id).toBe(first.id);
      expect(await store.listPostpaid()).toHaveLength(4);
    });
  });

  describe('recordDrink', () => {
    it('should charge a postpaid user into debt', async () => {
      const result = await service.recordDrink(alice, { type: 'self-postpaid' }, 150);

      expect(result.kind).toBe(UserKind.POSTPAID);
      expect(result.user.money).toBe(-150);
      expect(result.user.lastDrink).toBeInstanceOf(Date);
      expect((await store.getPostpaid('alice')).money).toBe(-150);
    });

    it('should throw InactiveUserException for deactivated users', async () => {
      await seedPostpaid('alice', 0, false);

      await expect(service.recordDrink(alice, { type: 'self-postpaid' }, 100)).rejects.toThrow(
        InactiveUserException,
      );
      expect((await store.getPostpaid('alice')).money).toBe(0);
    });

    it('should throw UnauthorizedException without a principal', async () => {
      await expect(service.recordDrink(null, { type: 'self-postpaid' }, 100)).rejects.toThrow(
        UnauthorizedException,
      );
    });

    it('should reject self-prepaid drinks for postpaid principals', async () => {
      await expect(service.recordDrink(alice, { type: 'self-prepaid' }, 100)).rejects.toThrow(
        ForbiddenException,
      );
    });

    it('should charge a prepaid user logged in by key', async () => {
      await service.addPrepaidUser(alice, 'alice-kid', 300);
      const kid: Principal = { username: 'alice-kid', groups: [], kind: UserKind.PREPAID };

      const result = await service.recordDrink(kid, { type: 'self-prepaid' }, 100);

      expect(result.kind).toBe(UserKind.PREPAID);
      expect(result.user.money).toBe(200);
    });

    it('should throw NotFoundException for an unknown key', async () => {
      await expect(
        service.recordDrink(null, { type: 'prepaid-key', userKey: 'nope' }, 100),
      ).rejects.toThrow(NotFoundException);
    });

    it('should reject a non-integer price', async () => {
      await expect(service.recordDrink(alice, { type: 'self-postpaid' }, 1.5)).rejects.toThrow(
        BadRequestException,
      );
    });

    it('should not lose concurrent drinks on one prepaid user', async () => {
      const kid = await service.addPrepaidUser(alice, 'alice-kid', 10000);

      await Promise.all(
        Array.from({ length: 50 }, () =>
          service.recordDrink(null, { type: 'prepaid-key', userKey: kid.userKey }, 100),
        ),
      );

      expect((await store.getPrepaid('alice-kid')).money).toBe(5000);
    });

    it('should allow a prepaid overdraft', async () => {
      const kid = await service.addPrepaidUser(alice, 'alice-kid', 50);

      const result = await service.recordDrink(
        null,
        { type: 'prepaid-key', userKey: kid.userKey },
        100,
      );

      expect(result.user.money).toBe(-50);
    });
  });

  describe('addPrepaidUser', () => {
    it('should create an activated prepaid user owned by the member', async () => {
      const owner = await store.getPostpaid('alice');

      const created = await service.addPrepaidUser(alice, 'alice-kid', 500);

      expect(created).toMatchObject({
        username: 'alice-kid',
        userKey: 'key-1',
        postpaidUserId: owner.id,
        money: 500,
        activated: true,
        lastDrink: null,
      });
      expect(mockGenerateUserKey).toHaveBeenCalledWith(6);
    });

    it('should throw ConflictException for a taken username', async () => {
      await service.addPrepaidUser(alice, 'kid', 0);

      await expect(service.addPrepaidUser(bob, 'kid', 0)).rejects.toThrow(ConflictException);
    });

    it('should throw ForbiddenException for non-members', async () => {
      await expect(service.addPrepaidUser(guest, 'kid', 0)).rejects.toThrow(ForbiddenException);
    });

    it('should never issue a key again after deletion', async () => {
      const first = await service.addPrepaidUser(alice, 'first', 0);
      await service.deletePrepaidUser(admin, 'first');
      keyCounter = 0;

      const second = await service.addPrepaidUser(alice, 'second', 0);

      expect(first.userKey).toBe('key-1');
      expect(second.userKey).toBe('key-2');
      await expect(
        service.recordDrink(null, { type: 'prepaid-key', userKey: 'key-1' }, 100),
      ).rejects.toThrow(NotFoundException);
    });
  });

  describe('addMoneyPrepaid', () => {
    beforeEach(async () => {
      await service.addPrepaidUser(alice, 'alice-kid', 0);
    });

    it('should let the owner top up', async () => {
      const updated = await service.addMoneyPrepaid(alice, 'alice-kid', 1000);

      expect(updated.money).toBe(1000);
    });

    it('should let admins top up any prepaid user', async () => {
      const updated = await service.addMoneyPrepaid(admin, 'alice-kid', 250);

      expect(updated.money).toBe(250);
    });

    it('should throw ForbiddenException for other members', async () => {
      await expect(service.addMoneyPrepaid(bob, 'alice-kid', 1000)).rejects.toThrow(
        ForbiddenException,
      );
      expect((await store.getPrepaid('alice-kid')).money).toBe(0);
    });

    it('should be undone by a drink of the same price', async () => {
      await service.addMoneyPrepaid(alice, 'alice-kid', 400);
      await service.recordDrink(null, { type: 'prepaid-key', userKey: 'key-1' }, 400);

      expect((await store.getPrepaid('alice-kid')).money).toBe(0);
    });
  });

  describe('payUp', () => {
    it('should move money from the admin to the user', async () => {
      await service.recordDrink(alice, { type: 'self-postpaid' }, 150);

      const result = await service.payUp(admin, 'alice', 500);

      expect(result.admin.money).toBe(500);
      expect(result.target.money).toBe(350);
      expect(mockRedisLockService.withLocks).toHaveBeenLastCalledWith(
        ['user:postpaid:admin', 'user:postpaid:alice'],
        expect.any(Function),
      );
    });

    it('should conserve the sum of both balances', async () => {
      await service.payUp(admin, 'bob', 730);
      await service.payUp(admin, 'bob', -30);

      const total =
        (await store.getPostpaid('admin')).money + (await store.getPostpaid('bob')).money;
      expect(total).toBe(1000);
    });

    it('should leave balances unchanged when paying up to oneself', async () => {
      const result = await service.payUp(admin, 'admin', 500);

      expect(result.admin.money).toBe(1000);
      expect((await store.getPostpaid('admin')).money).toBe(1000);
    });

    it('should throw NotFoundException without touching the admin', async () => {
      await expect(service.payUp(admin, 'nobody', 500)).rejects.toThrow(NotFoundException);
      expect((await store.getPostpaid('admin')).money).toBe(1000);
    });

    it('should throw ForbiddenException for members', async () => {
      await expect(service.payUp(alice, 'bob', 500)).rejects.toThrow(ForbiddenException);
    });
  });

  describe('admin operations', () => {
    it('should set postpaid money', async () => {
      const updated = await service.setMoneyPostpaid(admin, 'alice', -2000);

      expect(updated.money).toBe(-2000);
    });

    it('should set prepaid money and move the owner', async () => {
      await service.addPrepaidUser(alice, 'kid', 100);
      const bobRecord = await store.getPostpaid('bob');

      const updated = await service.setMoneyPrepaid(admin, 'kid', 700, 'bob');

      expect(updated.money).toBe(700);
      expect(updated.postpaidUserId).toBe(bobRecord.id);
    });

    it('should toggle activation of both kinds', async () => {
      await service.addPrepaidUser(alice, 'kid', 0);

      const postpaid = await service.toggleActivated(admin, 'alice', UserKind.POSTPAID);
      const prepaid = await service.toggleActivated(admin, 'kid', UserKind.PREPAID);

      expect(postpaid.activated).toBe(false);
      expect(prepaid.activated).toBe(false);
      expect(prepaid.userKey).toBe('key-1');
      await expect(
        service.recordDrink(null, { type: 'prepaid-key', userKey: 'key-1' }, 100),
      ).rejects.toThrow(InactiveUserException);
    });

    it('should throw ForbiddenException for members', async () => {
      await expect(service.setMoneyPostpaid(alice, 'alice', 100000)).rejects.toThrow(
        ForbiddenException,
      );
      await expect(
        service.toggleActivated(alice, 'alice', UserKind.POSTPAID),
      ).rejects.toThrow(ForbiddenException);
      await expect(service.deletePrepaidUser(alice, 'kid')).rejects.toThrow(ForbiddenException);
    });

    it('should throw NotFoundException when deleting an unknown prepaid user', async () => {
      await expect(service.deletePrepaidUser(admin, 'nobody')).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  describe('views', () => {
    it('should return all users to admins', async () => {
      await service.addPrepaidUser(alice, 'kid', 0);

      const stats = await service.getStats(admin);

      expect(stats.postpaidUsers.map((u) => u.username)).toEqual(['admin', 'alice', 'bob']);
      expect(stats.prepaidUsers.map((u) => u.username)).toEqual(['kid']);
    });

    it('should deny stats to members and anonymous callers', async () => {
      await expect(service.getStats(alice)).rejects.toThrow(ForbiddenException);
      await expect(service.getStats(null)).rejects.toThrow(UnauthorizedException);
    });

    it('should list only own prepaid users', async () => {
      await service.addPrepaidUser(alice, 'alice-kid', 0);
      await service.addPrepaidUser(bob, 'bob-kid', 0);

      const own = await service.listOwnPrepaidUsers(alice);

      expect(own.map((u) => u.username)).toEqual(['alice-kid']);
    });

    it('should include owned prepaid users in a member profile', async () => {
      await service.addPrepaidUser(alice, 'alice-kid', 0);

      const profile = await service.getProfile(alice);

      expect(profile.kind).toBe(UserKind.POSTPAID);
      expect(profile.user.username).toBe('alice');
      if (profile.kind === UserKind.POSTPAID) {
        expect(profile.prepaidUsers.map((u) => u.username)).toEqual(['alice-kid']);
      }
    });
  });
});
