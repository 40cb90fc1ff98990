import { Test, TestingModule } from '@nestjs/testing';
import { getConnectionToken, getModelToken } from '@nestjs/mongoose';
import {
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { Types, mongo } from 'mongoose';
import { MongoLedgerStore } from './mongo-ledger-store.service';
import { PostpaidUser } from '../../models/postpaid-user.schema';
import { PrepaidUser } from '../../models/prepaid-user.schema';
import { RetiredUserKey } from '../../models/retired-user-key.schema';
import { StoreUnavailableException } from '../../common/exceptions/ledger.exceptions';

// query chain: model.findOne(...).sort(...).session(...).exec()
const chain = (result: unknown) => {
  const query: any = {
    exec: jest.fn().mockResolvedValue(result),
  };
  query.session = jest.fn().mockReturnValue(query);
  query.sort = jest.fn().mockReturnValue(query);
  return query;
};

const failingChain = (error: Error) => {
  const query: any = {
    exec: jest.fn().mockRejectedValue(error),
  };
  query.session = jest.fn().mockReturnValue(query);
  return query;
};

describe('MongoLedgerStore', () => {
  let store: MongoLedgerStore;
  let postpaidModel: any;
  let prepaidModel: any;
  let retiredModel: any;

  const aliceId = new Types.ObjectId();
  const kidId = new Types.ObjectId();

  const mockSession = {
    withTransaction: jest.fn(async (callback: () => Promise<void>) => {
      await callback();
    }),
    endSession: jest.fn(),
  };

  const mockConnection = {
    readyState: 1,
    startSession: jest.fn(async () => mockSession),
  };

  const aliceDoc = () => ({
    _id: aliceId,
    username: 'alice',
    money: -150,
    activated: true,
    lastDrink: null,
    set: jest.fn(),
    save: jest.fn(),
  });

  const kidDoc = () => ({
    _id: kidId,
    username: 'alice-kid',
    userKey: 'key-1',
    postpaidUserId: aliceId,
    money: 500,
    activated: true,
    lastDrink: null,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MongoLedgerStore,
        {
          provide: getModelToken(PostpaidUser.name),
          useValue: {
            findOne: jest.fn(),
            find: jest.fn(),
            exists: jest.fn(),
            create: jest.fn(),
          },
        },
        {
          provide: getModelToken(PrepaidUser.name),
          useValue: {
            findOne: jest.fn(),
            find: jest.fn(),
            exists: jest.fn(),
            create: jest.fn(),
            findOneAndDelete: jest.fn(),
          },
        },
        {
          provide: getModelToken(RetiredUserKey.name),
          useValue: {
            exists: jest.fn(),
            create: jest.fn(),
          },
        },
        {
          provide: getConnectionToken(),
          useValue: mockConnection,
        },
      ],
    }).compile();

    store = module.get<MongoLedgerStore>(MongoLedgerStore);
    postpaidModel = module.get(getModelToken(PostpaidUser.name));
    prepaidModel = module.get(getModelToken(PrepaidUser.name));
    retiredModel = module.get(getModelToken(RetiredUserKey.name));
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('getPostpaid', () => {
    it('should map the document to a record', async () => {
      postpaidModel.findOne.mockReturnValue(chain(aliceDoc()));

      const result = await store.getPostpaid('alice');

      expect(postpaidModel.findOne).toHaveBeenCalledWith({ username: 'alice' });
      expect(result).toEqual({
        id: aliceId.toString(),
        username: 'alice',
        money: -150,
        activated: true,
        lastDrink: null,
      });
    });

    it('should throw NotFoundException if user not found', async () => {
      postpaidModel.findOne.mockReturnValue(chain(null));

      await expect(store.getPostpaid('nobody')).rejects.toThrow(NotFoundException);
    });

    it('should throw StoreUnavailableException on network errors', async () => {
      postpaidModel.findOne.mockReturnValue(
        failingChain(new mongo.MongoNetworkError('connection refused')),
      );

      await expect(store.getPostpaid('alice')).rejects.toThrow(StoreUnavailableException);
    });

    it('should wrap unknown errors', async () => {
      postpaidModel.findOne.mockReturnValue(failingChain(new Error('boom')));

      await expect(store.getPostpaid('alice')).rejects.toThrow(
        InternalServerErrorException,
      );
    });
  });

  describe('upsertPostpaid', () => {
    it('should update an existing document in place', async () => {
      const doc = aliceDoc();
      postpaidModel.findOne.mockReturnValue(chain(doc));
      const lastDrink = new Date('2026-01-01T12:00:00Z');

      await store.upsertPostpaid({
        id: aliceId.toString(),
        username: 'alice',
        money: -300,
        activated: true,
        lastDrink,
      });

      expect(doc.set).toHaveBeenCalledWith({ money: -300, activated: true, lastDrink });
      expect(doc.save).toHaveBeenCalled();
      expect(postpaidModel.create).not.toHaveBeenCalled();
    });

    it('should create a document when the username is new', async () => {
      postpaidModel.findOne.mockReturnValue(chain(null));
      postpaidModel.create.mockResolvedValue([{ ...aliceDoc(), money: 0, activated: false }]);

      const result = await store.upsertPostpaid({
        username: 'alice',
        money: 0,
        activated: false,
        lastDrink: null,
      });

      expect(postpaidModel.create).toHaveBeenCalledWith(
        [{ username: 'alice', money: 0, activated: false, lastDrink: null }],
        { session: null },
      );
      expect(result.id).toBe(aliceId.toString());
    });

    it('should throw ConflictException when the id does not match', async () => {
      postpaidModel.findOne.mockReturnValue(chain(aliceDoc()));

      await expect(
        store.upsertPostpaid({
          id: new Types.ObjectId().toString(),
          username: 'alice',
          money: 0,
          activated: true,
          lastDrink: null,
        }),
      ).rejects.toThrow(ConflictException);
    });

    it('should translate duplicate key errors to ConflictException', async () => {
      postpaidModel.findOne.mockReturnValue(chain(null));
      postpaidModel.create.mockRejectedValue(
        new mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 }),
      );

      await expect(
        store.upsertPostpaid({ username: 'alice', money: 0, activated: false, lastDrink: null }),
      ).rejects.toThrow(ConflictException);
    });
  });

  describe('upsertPrepaid', () => {
    const input = {
      username: 'alice-kid',
      userKey: 'key-1',
      postpaidUserId: aliceId.toString(),
      money: 500,
      activated: true,
      lastDrink: null,
    };

    it('should reject a retired key', async () => {
      prepaidModel.findOne.mockReturnValue(chain(null));
      retiredModel.exists.mockReturnValue(chain({ _id: new Types.ObjectId() }));

      await expect(store.upsertPrepaid(input)).rejects.toThrow(ConflictException);
      expect(prepaidModel.create).not.toHaveBeenCalled();
    });

    it('should reject an unknown owner', async () => {
      prepaidModel.findOne.mockReturnValue(chain(null));
      retiredModel.exists.mockReturnValue(chain(null));
      postpaidModel.exists.mockReturnValue(chain(null));

      await expect(store.upsertPrepaid(input)).rejects.toThrow(NotFoundException);
    });

    it('should reject a key change of an existing prepaid user', async () => {
      prepaidModel.findOne.mockReturnValue(chain(kidDoc()));

      await expect(store.upsertPrepaid({ ...input, userKey: 'key-2' })).rejects.toThrow(
        ConflictException,
      );
      expect(retiredModel.exists).not.toHaveBeenCalled();
    });

    it('should not query the retired keys before the key owner lookup resolves', async () => {
      let release: (value: unknown) => void = () => undefined;
      const keyLookup: any = {
        exec: jest.fn(
          () =>
            new Promise((resolve) => {
              release = resolve;
            }),
        ),
      };
      keyLookup.session = jest.fn().mockReturnValue(keyLookup);
      prepaidModel.findOne.mockReturnValueOnce(chain(null)).mockReturnValueOnce(keyLookup);
      retiredModel.exists.mockReturnValue(chain(null));
      postpaidModel.exists.mockReturnValue(chain({ _id: aliceId }));
      prepaidModel.create.mockResolvedValue([kidDoc()]);

      const pending = store.upsertPrepaid(input);
      await new Promise((resolve) => setImmediate(resolve));

      expect(keyLookup.exec).toHaveBeenCalled();
      expect(retiredModel.exists).not.toHaveBeenCalled();

      release(null);
      await pending;
      expect(retiredModel.exists).toHaveBeenCalledWith({ userKey: 'key-1' });
    });

    it('should create the prepaid user', async () => {
      prepaidModel.findOne.mockReturnValue(chain(null));
      retiredModel.exists.mockReturnValue(chain(null));
      postpaidModel.exists.mockReturnValue(chain({ _id: aliceId }));
      prepaidModel.create.mockResolvedValue([kidDoc()]);

      const result = await store.upsertPrepaid(input);

      expect(result).toEqual({
        id: kidId.toString(),
        username: 'alice-kid',
        userKey: 'key-1',
        postpaidUserId: aliceId.toString(),
        money: 500,
        activated: true,
        lastDrink: null,
      });
    });
  });

  describe('deletePrepaid', () => {
    it('should delete and retire the key inside one transaction', async () => {
      prepaidModel.findOneAndDelete.mockReturnValue(chain(kidDoc()));
      retiredModel.create.mockResolvedValue([{}]);

      await store.deletePrepaid('alice-kid');

      expect(mockConnection.startSession).toHaveBeenCalled();
      expect(mockSession.withTransaction).toHaveBeenCalled();
      expect(retiredModel.create).toHaveBeenCalledWith(
        [{ userKey: 'key-1', username: 'alice-kid' }],
        { session: mockSession },
      );
      expect(mockSession.endSession).toHaveBeenCalled();
    });

    it('should throw NotFoundException and end the session', async () => {
      prepaidModel.findOneAndDelete.mockReturnValue(chain(null));

      await expect(store.deletePrepaid('nobody')).rejects.toThrow(NotFoundException);
      expect(retiredModel.create).not.toHaveBeenCalled();
      expect(mockSession.endSession).toHaveBeenCalled();
    });
  });

  describe('runInTransaction', () => {
    it('should bind queries to the session and return the result', async () => {
      const query = chain(aliceDoc());
      postpaidModel.findOne.mockReturnValue(query);

      const money = await store.runInTransaction(async (tx) => {
        const alice = await tx.getPostpaid('alice');
        return alice.money;
      });

      expect(money).toBe(-150);
      expect(query.session).toHaveBeenCalledWith(mockSession);
    });
  });

  describe('isUserKeyTaken', () => {
    it('should check live and retired keys', async () => {
      prepaidModel.exists.mockReturnValue(chain(null));
      retiredModel.exists.mockReturnValue(chain({ _id: new Types.ObjectId() }));

      expect(await store.isUserKeyTaken('key-1')).toBe(true);
      expect(prepaidModel.exists).toHaveBeenCalledWith({ userKey: 'key-1' });
    });

    it('should skip the retired keys when a live user holds the key', async () => {
      prepaidModel.exists.mockReturnValue(chain({ _id: kidId }));

      expect(await store.isUserKeyTaken('key-1')).toBe(true);
      expect(retiredModel.exists).not.toHaveBeenCalled();
    });
  });

  it('should report connectivity from the connection state', async () => {
    expect(await store.healthCheck()).toEqual({ driver: 'mongo', connected: true });
  });
});
