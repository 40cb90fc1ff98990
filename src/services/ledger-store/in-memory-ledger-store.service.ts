import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import {
  LedgerStore,
  LedgerStoreHealth,
  PostpaidUserInput,
  PostpaidUserRecord,
  PrepaidUserInput,
  PrepaidUserRecord,
} from './ledger-store';

interface LedgerState {
  postpaid: Map<string, PostpaidUserRecord>;
  prepaid: Map<string, PrepaidUserRecord>;
  retiredKeys: Set<string>;
  sequence: number;
}

const emptyState = (): LedgerState => ({
  postpaid: new Map(),
  prepaid: new Map(),
  retiredKeys: new Set(),
  sequence: 0,
});

const cloneState = (state: LedgerState): LedgerState => ({
  postpaid: new Map(
    Array.from(state.postpaid, ([username, record]) => [username, { ...record }]),
  ),
  prepaid: new Map(
    Array.from(state.prepaid, ([username, record]) => [username, { ...record }]),
  ),
  retiredKeys: new Set(state.retiredKeys),
  sequence: state.sequence,
});

/**
 * Operations applied directly to one state object.
 * Maps keep insertion order, and replacing a key keeps its position.
 */
class LedgerStateView extends LedgerStore {
  constructor(private readonly state: LedgerState) {
    super();
  }

  async getPostpaid(username: string): Promise<PostpaidUserRecord> {
    const record = this.state.postpaid.get(username);
    if (!record) {
      throw new NotFoundException(`Postpaid user ${username} not found`);
    }
    return { ...record };
  }

  async findPostpaid(username: string): Promise<PostpaidUserRecord | null> {
    const record = this.state.postpaid.get(username);
    return record ? { ...record } : null;
  }

  async listPostpaid(): Promise<PostpaidUserRecord[]> {
    return Array.from(this.state.postpaid.values(), (record) => ({ ...record }));
  }

  async upsertPostpaid(input: PostpaidUserInput): Promise<PostpaidUserRecord> {
    const existing = this.state.postpaid.get(input.username);
    if (existing && input.id !== undefined && input.id !== existing.id) {
      throw new ConflictException(
        `Postpaid user ${input.username} already exists with another ID`,
      );
    }
    if (!existing && input.id !== undefined && this.isIdTaken(input.id)) {
      throw new ConflictException(`ID ${input.id} is already in use`);
    }
    if (existing && existing.userKey !== input.userKey) {
      throw new ConflictException(`User key of ${input.username} cannot be changed`);
    }

    const record: PostpaidUserRecord = {
      id: existing?.id ?? input.id ?? this.nextId(),
      username: input.username,
      money: input.money,
      activated: input.activated,
      lastDrink: input.lastDrink,
    };
    this.state.postpaid.set(record.username, record);
    return { ...record };
  }

  async getPrepaid(username: string): Promise<PrepaidUserRecord> {
    const record = this.state.prepaid.get(username);
    if (!record) {
      throw new NotFoundException(`Prepaid user ${username} not found`);
    }
    return { ...record };
  }

  async findPrepaid(username: string): Promise<PrepaidUserRecord | null> {
    const record = this.state.prepaid.get(username);
    return record ? { ...record } : null;
  }

  async getPrepaidByKey(userKey: string): Promise<PrepaidUserRecord> {
    const record = this.prepaidByKey(userKey);
    if (!record) {
      throw new NotFoundException('Unknown user key');
    }
    return { ...record };
  }

  async listPrepaidByOwner(postpaidUserId: string): Promise<PrepaidUserRecord[]> {
    return Array.from(this.state.prepaid.values())
      .filter((record) => record.postpaidUserId === postpaidUserId)
      .map((record) => ({ ...record }));
  }

  async listPrepaid(): Promise<PrepaidUserRecord[]> {
    return Array.from(this.state.prepaid.values(), (record) => ({ ...record }));
  }

  async upsertPrepaid(input: PrepaidUserInput): Promise<PrepaidUserRecord> {
    const existing = this.state.prepaid.get(input.username);
    if (existing && input.id !== undefined && input.id !== existing.id) {
      throw new ConflictException(
        `Prepaid user ${input.username} already exists with another ID`,
      );
    }
    if (!existing && input.id !== undefined && this.isIdTaken(input.id)) {
      throw new ConflictException(`ID ${input.id} is already in use`);
    }
    if (existing && existing.userKey !== input.userKey) {
      throw new ConflictException(`User key of ${input.username} cannot be changed`);
    }

    const keyOwner = this.prepaidByKey(input.userKey);
    if (
      this.state.retiredKeys.has(input.userKey) ||
      (keyOwner && keyOwner.username !== input.username)
    ) {
      throw new ConflictException('User key is already in use');
    }

    if (!this.postpaidById(input.postpaidUserId)) {
      throw new NotFoundException(
        `Owner with ID ${input.postpaidUserId} not found`,
      );
    }

    const record: PrepaidUserRecord = {
      id: existing?.id ?? input.id ?? this.nextId(),
      username: input.username,
      userKey: input.userKey,
      postpaidUserId: input.postpaidUserId,
      money: input.money,
      activated: input.activated,
      lastDrink: input.lastDrink,
    };
    this.state.prepaid.set(record.username, record);
    return { ...record };
  }

  async deletePrepaid(username: string): Promise<void> {
    const record = this.state.prepaid.get(username);
    if (!record) {
      throw new NotFoundException(`Prepaid user ${username} not found`);
    }
    this.state.prepaid.delete(username);
    this.state.retiredKeys.add(record.userKey);
  }

  async isUserKeyTaken(userKey: string): Promise<boolean> {
    return this.state.retiredKeys.has(userKey) || this.prepaidByKey(userKey) !== undefined;
  }

  // writes land on a copy, the copy replaces the state only if work resolves
  async runInTransaction<T>(work: (tx: LedgerStore) => Promise<T>): Promise<T> {
    const staged = cloneState(this.state);
    const result = await work(new LedgerStateView(staged));
    Object.assign(this.state, staged);
    return result;
  }

  async healthCheck(): Promise<LedgerStoreHealth> {
    return { driver: 'memory', connected: true };
  }

  private nextId(): string {
    this.state.sequence += 1;
    return String(this.state.sequence);
  }

  private isIdTaken(id: string): boolean {
    return (
      this.postpaidById(id) !== undefined ||
      Array.from(this.state.prepaid.values()).some((record) => record.id === id)
    );
  }

  private postpaidById(id: string): PostpaidUserRecord | undefined {
    return Array.from(this.state.postpaid.values()).find((record) => record.id === id);
  }

  private prepaidByKey(userKey: string): PrepaidUserRecord | undefined {
    return Array.from(this.state.prepaid.values()).find(
      (record) => record.userKey === userKey,
    );
  }
}

/**
 * InMemoryLedgerStore
 *
 * Process-local LedgerStore used by tests and by LEDGER_STORE=memory.
 * Every call, including a whole transaction, runs inside one global
 * critical section, so readers never observe half of a transaction.
 *
 * Work passed to runInTransaction must use the `tx` handle; calling back
 * into this store from inside it would wait on itself.
 */
@Injectable()
export class InMemoryLedgerStore extends LedgerStore {
  private readonly logger = new Logger(InMemoryLedgerStore.name);
  private readonly view = new LedgerStateView(emptyState());
  private queue: Promise<void> = Promise.resolve();

  constructor() {
    super();
    this.logger.log('Using in-memory ledger store, data is lost on restart');
  }

  getPostpaid(username: string): Promise<PostpaidUserRecord> {
    return this.exclusive((view) => view.getPostpaid(username));
  }

  findPostpaid(username: string): Promise<PostpaidUserRecord | null> {
    return this.exclusive((view) => view.findPostpaid(username));
  }

  listPostpaid(): Promise<PostpaidUserRecord[]> {
    return this.exclusive((view) => view.listPostpaid());
  }

  upsertPostpaid(record: PostpaidUserInput): Promise<PostpaidUserRecord> {
    return this.exclusive((view) => view.upsertPostpaid(record));
  }

  getPrepaid(username: string): Promise<PrepaidUserRecord> {
    return this.exclusive((view) => view.getPrepaid(username));
  }

  findPrepaid(username: string): Promise<PrepaidUserRecord | null> {
    return this.exclusive((view) => view.findPrepaid(username));
  }

  getPrepaidByKey(userKey: string): Promise<PrepaidUserRecord> {
    return this.exclusive((view) => view.getPrepaidByKey(userKey));
  }

  listPrepaidByOwner(postpaidUserId: string): Promise<PrepaidUserRecord[]> {
    return this.exclusive((view) => view.listPrepaidByOwner(postpaidUserId));
  }

  listPrepaid(): Promise<PrepaidUserRecord[]> {
    return this.exclusive((view) => view.listPrepaid());
  }

  upsertPrepaid(record: PrepaidUserInput): Promise<PrepaidUserRecord> {
    return this.exclusive((view) => view.upsertPrepaid(record));
  }

  deletePrepaid(username: string): Promise<void> {
    return this.exclusive((view) => view.deletePrepaid(username));
  }

  isUserKeyTaken(userKey: string): Promise<boolean> {
    return this.exclusive((view) => view.isUserKeyTaken(userKey));
  }

  runInTransaction<T>(work: (tx: LedgerStore) => Promise<T>): Promise<T> {
    return this.exclusive((view) => view.runInTransaction(work));
  }

  healthCheck(): Promise<LedgerStoreHealth> {
    return this.view.healthCheck();
  }

  private exclusive<T>(work: (view: LedgerStore) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => work(this.view));
    // the caller gets the rejection through `run`, the queue just moves on
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
