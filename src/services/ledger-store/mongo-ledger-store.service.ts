import {
  ConflictException,
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import {
  ClientSession,
  Connection,
  ConnectionStates,
  Error as MongooseError,
  HydratedDocument,
  Model,
  Types,
  mongo,
} from 'mongoose';
import { StoreUnavailableException } from '../../common/exceptions/ledger.exceptions';
import {
  PostpaidUser,
  PrepaidUser,
  RetiredUserKey,
} from '../../models';
import {
  LedgerStore,
  LedgerStoreHealth,
  PostpaidUserInput,
  PostpaidUserRecord,
  PrepaidUserInput,
  PrepaidUserRecord,
} from './ledger-store';

interface LedgerModels {
  postpaid: Model<PostpaidUser>;
  prepaid: Model<PrepaidUser>;
  retired: Model<RetiredUserKey>;
}

const toPostpaidRecord = (
  doc: HydratedDocument<PostpaidUser>,
): PostpaidUserRecord => ({
  id: doc._id.toString(),
  username: doc.username,
  money: doc.money,
  activated: doc.activated,
  lastDrink: doc.lastDrink ?? null,
});

const toPrepaidRecord = (
  doc: HydratedDocument<PrepaidUser>,
): PrepaidUserRecord => ({
  id: doc._id.toString(),
  username: doc.username,
  userKey: doc.userKey,
  postpaidUserId: doc.postpaidUserId.toString(),
  money: doc.money,
  activated: doc.activated,
  lastDrink: doc.lastDrink ?? null,
});

// операции над коллекциями, опционально внутри сессии
// вне сессии ошибки драйвера переводятся в http исключения,
// внутри сессии пробрасываются как есть, чтобы withTransaction мог повторить
class MongoLedgerRepository extends LedgerStore {
  protected readonly logger = new Logger(MongoLedgerStore.name);

  constructor(
    protected readonly connection: Connection,
    protected readonly models: LedgerModels,
    private readonly session: ClientSession | null = null,
  ) {
    super();
  }

  getPostpaid(username: string): Promise<PostpaidUserRecord> {
    return this.run('get postpaid user', async () => {
      const user = await this.models.postpaid
        .findOne({ username })
        .session(this.session)
        .exec();
      if (!user) {
        throw new NotFoundException(`Postpaid user ${username} not found`);
      }
      return toPostpaidRecord(user);
    });
  }

  findPostpaid(username: string): Promise<PostpaidUserRecord | null> {
    return this.run('find postpaid user', async () => {
      const user = await this.models.postpaid
        .findOne({ username })
        .session(this.session)
        .exec();
      return user ? toPostpaidRecord(user) : null;
    });
  }

  listPostpaid(): Promise<PostpaidUserRecord[]> {
    return this.run('list postpaid users', async () => {
      const users = await this.models.postpaid
        .find()
        .sort({ _id: 1 })
        .session(this.session)
        .exec();
      return users.map(toPostpaidRecord);
    });
  }

  upsertPostpaid(input: PostpaidUserInput): Promise<PostpaidUserRecord> {
    return this.run('save postpaid user', async () => {
      const existing = await this.models.postpaid
        .findOne({ username: input.username })
        .session(this.session)
        .exec();

      if (existing) {
        if (input.id !== undefined && input.id !== existing._id.toString()) {
          throw new ConflictException(
            `Postpaid user ${input.username} already exists with another ID`,
          );
        }
        existing.set({
          money: input.money,
          activated: input.activated,
          lastDrink: input.lastDrink,
        });
        await existing.save();
        return toPostpaidRecord(existing);
      }

      const [created] = await this.models.postpaid.create(
        [
          {
            ...this.explicitId(input.id),
            username: input.username,
            money: input.money,
            activated: input.activated,
            lastDrink: input.lastDrink,
          },
        ],
        { session: this.session },
      );
      return toPostpaidRecord(created);
    });
  }

  getPrepaid(username: string): Promise<PrepaidUserRecord> {
    return this.run('get prepaid user', async () => {
      const user = await this.models.prepaid
        .findOne({ username })
        .session(this.session)
        .exec();
      if (!user) {
        throw new NotFoundException(`Prepaid user ${username} not found`);
      }
      return toPrepaidRecord(user);
    });
  }

  findPrepaid(username: string): Promise<PrepaidUserRecord | null> {
    return this.run('find prepaid user', async () => {
      const user = await this.models.prepaid
        .findOne({ username })
        .session(this.session)
        .exec();
      return user ? toPrepaidRecord(user) : null;
    });
  }

  getPrepaidByKey(userKey: string): Promise<PrepaidUserRecord> {
    return this.run('get prepaid user', async () => {
      const user = await this.models.prepaid
        .findOne({ userKey })
        .session(this.session)
        .exec();
      if (!user) {
        throw new NotFoundException('Unknown user key');
      }
      return toPrepaidRecord(user);
    });
  }

  listPrepaidByOwner(postpaidUserId: string): Promise<PrepaidUserRecord[]> {
    return this.run('list prepaid users', async () => {
      if (!Types.ObjectId.isValid(postpaidUserId)) {
        return [];
      }
      const users = await this.models.prepaid
        .find({ postpaidUserId: new Types.ObjectId(postpaidUserId) })
        .sort({ _id: 1 })
        .session(this.session)
        .exec();
      return users.map(toPrepaidRecord);
    });
  }

  listPrepaid(): Promise<PrepaidUserRecord[]> {
    return this.run('list prepaid users', async () => {
      const users = await this.models.prepaid
        .find()
        .sort({ _id: 1 })
        .session(this.session)
        .exec();
      return users.map(toPrepaidRecord);
    });
  }

  upsertPrepaid(input: PrepaidUserInput): Promise<PrepaidUserRecord> {
    return this.run('save prepaid user', async () => {
      const existing = await this.models.prepaid
        .findOne({ username: input.username })
        .session(this.session)
        .exec();
      if (existing && input.id !== undefined && input.id !== existing._id.toString()) {
        throw new ConflictException(
          `Prepaid user ${input.username} already exists with another ID`,
        );
      }
      if (existing && existing.userKey !== input.userKey) {
        throw new ConflictException(`User key of ${input.username} cannot be changed`);
      }

      // операции одной сессии только последовательно
      const keyOwner = await this.models.prepaid
        .findOne({ userKey: input.userKey })
        .session(this.session)
        .exec();
      const retired = await this.models.retired
        .exists({ userKey: input.userKey })
        .session(this.session)
        .exec();
      if (retired || (keyOwner && keyOwner.username !== input.username)) {
        throw new ConflictException('User key is already in use');
      }

      const owner = Types.ObjectId.isValid(input.postpaidUserId)
        ? await this.models.postpaid
            .exists({ _id: new Types.ObjectId(input.postpaidUserId) })
            .session(this.session)
            .exec()
        : null;
      if (!owner) {
        throw new NotFoundException(`Owner with ID ${input.postpaidUserId} not found`);
      }

      const fields = {
        userKey: input.userKey,
        postpaidUserId: new Types.ObjectId(input.postpaidUserId),
        money: input.money,
        activated: input.activated,
        lastDrink: input.lastDrink,
      };

      if (existing) {
        existing.set(fields);
        await existing.save();
        return toPrepaidRecord(existing);
      }

      const [created] = await this.models.prepaid.create(
        [{ ...this.explicitId(input.id), username: input.username, ...fields }],
        { session: this.session },
      );
      return toPrepaidRecord(created);
    });
  }

  // удаление и запись ключа в retired_user_keys в одной транзакции
  deletePrepaid(username: string): Promise<void> {
    return this.runInTransaction(async (tx) => {
      if (!(tx instanceof MongoLedgerRepository)) {
        throw new InternalServerErrorException('Unexpected transaction handle');
      }
      await tx.deleteAndRetire(username);
    });
  }

  isUserKeyTaken(userKey: string): Promise<boolean> {
    return this.run('check user key', async () => {
      const live = await this.models.prepaid.exists({ userKey }).session(this.session).exec();
      if (live !== null) {
        return true;
      }
      const retired = await this.models.retired.exists({ userKey }).session(this.session).exec();
      return retired !== null;
    });
  }

  async runInTransaction<T>(work: (tx: LedgerStore) => Promise<T>): Promise<T> {
    // вложенный вызов продолжает внешнюю транзакцию
    if (this.session) {
      return work(this);
    }

    const session = await this.run('start session', () =>
      this.connection.startSession(),
    );

    try {
      const results: T[] = [];
      await session.withTransaction(async () => {
        // withTransaction может повторить колбэк при TransientTransactionError
        results.length = 0;
        results.push(
          await work(new MongoLedgerRepository(this.connection, this.models, session)),
        );
      });
      if (results.length === 0) {
        throw new InternalServerErrorException('Transaction finished without a result');
      }
      return results[0];
    } catch (error) {
      throw this.translateError('run transaction', error);
    } finally {
      await session.endSession();
    }
  }

  async healthCheck(): Promise<LedgerStoreHealth> {
    return {
      driver: 'mongo',
      connected: this.connection.readyState === ConnectionStates.connected,
    };
  }

  private async deleteAndRetire(username: string): Promise<void> {
    const deleted = await this.models.prepaid
      .findOneAndDelete({ username })
      .session(this.session)
      .exec();
    if (!deleted) {
      throw new NotFoundException(`Prepaid user ${username} not found`);
    }

    await this.models.retired.create(
      [{ userKey: deleted.userKey, username: deleted.username }],
      { session: this.session },
    );

    this.logger.log(`Deleted prepaid user ${username}, user key retired`);
  }

  private explicitId(id: string | undefined): { _id?: Types.ObjectId } {
    if (id === undefined) {
      return {};
    }
    if (!Types.ObjectId.isValid(id)) {
      throw new ConflictException(`ID ${id} is not a valid identifier`);
    }
    return { _id: new Types.ObjectId(id) };
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.session) {
      return fn();
    }
    try {
      return await fn();
    } catch (error) {
      throw this.translateError(operation, error);
    }
  }

  protected translateError(operation: string, error: unknown): Error {
    // Re-throw known exceptions
    if (error instanceof HttpException) {
      return error;
    }

    if (
      error instanceof mongo.MongoNetworkError ||
      error instanceof mongo.MongoServerSelectionError ||
      error instanceof mongo.MongoNotConnectedError ||
      error instanceof MongooseError.MongooseServerSelectionError
    ) {
      this.logger.error(`MongoDB unavailable during ${operation}: ${error.message}`);
      return new StoreUnavailableException(`Ledger store is unavailable: ${error.message}`, error);
    }

    if (error instanceof mongo.MongoServerError && error.code === 11000) {
      return new ConflictException('Record with the same key already exists');
    }

    // Wrap unknown errors
    this.logger.error(`Error during ${operation}:`, error);
    const errorMessage =
      error instanceof Error ? error.message : 'Unknown error occurred';
    return new InternalServerErrorException(`Failed to ${operation}: ${errorMessage}`);
  }
}

/**
 * MongoLedgerStore
 *
 * LedgerStore backed by MongoDB through Mongoose.
 * runInTransaction needs a replica set (multi-document transactions).
 *
 * Collections: users_postpaid, users_prepaid, retired_user_keys
 */
@Injectable()
export class MongoLedgerStore extends MongoLedgerRepository {
  constructor(
    @InjectConnection() connection: Connection,
    @InjectModel(PostpaidUser.name) postpaidModel: Model<PostpaidUser>,
    @InjectModel(PrepaidUser.name) prepaidModel: Model<PrepaidUser>,
    @InjectModel(RetiredUserKey.name) retiredModel: Model<RetiredUserKey>,
  ) {
    super(connection, {
      postpaid: postpaidModel,
      prepaid: prepaidModel,
      retired: retiredModel,
    });
  }
}
