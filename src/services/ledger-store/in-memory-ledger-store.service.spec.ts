import { ConflictException, NotFoundException } from '@nestjs/common';
import { InMemoryLedgerStore } from './in-memory-ledger-store.service';
import { PostpaidUserRecord } from './ledger-store';

describe('InMemoryLedgerStore', () => {
  let store: InMemoryLedgerStore;
  let owner: PostpaidUserRecord;

  beforeEach(async () => {
    store = new InMemoryLedgerStore();
    owner = await store.upsertPostpaid({
      username: 'alice',
      money: 0,
      activated: true,
      lastDrink: null,
    });
  });

  const prepaidInput = (username: string, userKey: string) => ({
    username,
    userKey,
    postpaidUserId: owner.id,
    money: 500,
    activated: true,
    lastDrink: null,
  });

  describe('postpaid users', () => {
    it('should assign an id on insert and keep it on update', async () => {
      const updated = await store.upsertPostpaid({ ...owner, money: -150 });

      expect(updated.id).toBe(owner.id);
      expect(await store.getPostpaid('alice')).toEqual({ ...owner, money: -150 });
    });

    it('should throw NotFoundException for unknown users', async () => {
      await expect(store.getPostpaid('nobody')).rejects.toThrow(NotFoundException);
      expect(await store.findPostpaid('nobody')).toBeNull();
    });

    it('should throw ConflictException when the id changes', async () => {
      await expect(
        store.upsertPostpaid({ ...owner, id: 'other', money: 10 }),
      ).rejects.toThrow(ConflictException);
    });

    it('should return copies', async () => {
      const record = await store.getPostpaid('alice');
      record.money = 1_000_000;

      expect((await store.getPostpaid('alice')).money).toBe(0);
    });

    it('should list in insertion order', async () => {
      await store.upsertPostpaid({ username: 'carol', money: 0, activated: false, lastDrink: null });
      await store.upsertPostpaid({ username: 'bob', money: 0, activated: false, lastDrink: null });
      await store.upsertPostpaid({ ...owner, money: 5 });

      const usernames = (await store.listPostpaid()).map((u) => u.username);
      expect(usernames).toEqual(['alice', 'carol', 'bob']);
    });
  });

  describe('prepaid users', () => {
    it('should find prepaid users by key and by owner', async () => {
      const created = await store.upsertPrepaid(prepaidInput('alice-kid', 'key-1'));

      expect(await store.getPrepaidByKey('key-1')).toEqual(created);
      expect(await store.listPrepaidByOwner(owner.id)).toEqual([created]);
      expect(await store.listPrepaidByOwner('999')).toEqual([]);
    });

    it('should reject a key that belongs to another prepaid user', async () => {
      await store.upsertPrepaid(prepaidInput('first', 'key-1'));

      await expect(store.upsertPrepaid(prepaidInput('second', 'key-1'))).rejects.toThrow(
        ConflictException,
      );
    });

    it('should reject an unknown owner', async () => {
      await expect(
        store.upsertPrepaid({ ...prepaidInput('orphan', 'key-1'), postpaidUserId: '999' }),
      ).rejects.toThrow(NotFoundException);
    });

    it('should retire the key of a deleted prepaid user', async () => {
      await store.upsertPrepaid(prepaidInput('alice-kid', 'key-1'));

      await store.deletePrepaid('alice-kid');

      await expect(store.getPrepaidByKey('key-1')).rejects.toThrow(NotFoundException);
      expect(await store.isUserKeyTaken('key-1')).toBe(true);
      await expect(store.upsertPrepaid(prepaidInput('new-kid', 'key-1'))).rejects.toThrow(
        ConflictException,
      );
    });

    it('should reject a key change of an existing prepaid user', async () => {
      const created = await store.upsertPrepaid(prepaidInput('alice-kid', 'key-1'));

      await expect(store.upsertPrepaid({ ...created, userKey: 'key-2' })).rejects.toThrow(
        ConflictException,
      );
      expect((await store.getPrepaid('alice-kid')).userKey).toBe('key-1');
      expect(await store.isUserKeyTaken('key-2')).toBe(false);
    });

    it('should throw NotFoundException when deleting an unknown prepaid user', async () => {
      await expect(store.deletePrepaid('nobody')).rejects.toThrow(NotFoundException);
    });
  });

  describe('runInTransaction', () => {
    it('should commit all writes when work resolves', async () => {
      await store.runInTransaction(async (tx) => {
        const alice = await tx.getPostpaid('alice');
        await tx.upsertPostpaid({ ...alice, money: 100 });
        await tx.upsertPostpaid({ username: 'bob', money: -100, activated: true, lastDrink: null });
      });

      expect((await store.getPostpaid('alice')).money).toBe(100);
      expect((await store.getPostpaid('bob')).money).toBe(-100);
    });

    it('should discard all writes when work rejects', async () => {
      await expect(
        store.runInTransaction(async (tx) => {
          const alice = await tx.getPostpaid('alice');
          await tx.upsertPostpaid({ ...alice, money: 100 });
          await tx.getPostpaid('nobody');
        }),
      ).rejects.toThrow(NotFoundException);

      expect((await store.getPostpaid('alice')).money).toBe(0);
    });

    it('should serialise concurrent read-modify-write transactions', async () => {
      await Promise.all(
        Array.from({ length: 20 }, () =>
          store.runInTransaction(async (tx) => {
            const alice = await tx.getPostpaid('alice');
            await new Promise((resolve) => setImmediate(resolve));
            await tx.upsertPostpaid({ ...alice, money: alice.money - 100 });
          }),
        ),
      );

      expect((await store.getPostpaid('alice')).money).toBe(-2000);
    });

    it('should keep serving after a failed transaction', async () => {
      await expect(
        store.runInTransaction(async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      expect(await store.findPostpaid('alice')).not.toBeNull();
    });
  });

  it('should report a healthy memory driver', async () => {
    expect(await store.healthCheck()).toEqual({ driver: 'memory', connected: true });
  });
});
