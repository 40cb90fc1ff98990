export interface PostpaidUserRecord {
  id: string;
  username: string;
  money: number; // cents, signed
  activated: boolean;
  lastDrink: Date | null;
}

export interface PrepaidUserRecord {
  id: string;
  username: string;
  userKey: string;
  postpaidUserId: string;
  money: number; // cents, signed
  activated: boolean;
  lastDrink: Date | null;
}

/**
 * Upsert input: `id` is assigned by the store on insert.
 * When given, it must match the stored record.
 */
export type PostpaidUserInput = Omit<PostpaidUserRecord, 'id'> & { id?: string };
export type PrepaidUserInput = Omit<PrepaidUserRecord, 'id'> & { id?: string };

export interface LedgerStoreHealth {
  driver: string;
  connected: boolean;
}

/**
 * LedgerStore
 *
 * Durable keyed storage of postpaid users (by username) and prepaid users
 * (by username, also reachable by userKey and by owner).
 *
 * Contract:
 * - get* and delete* throw NotFoundException for unknown keys, find* return null
 * - upsert* throw ConflictException when the call would change a record's identity
 * - list* return records in insertion order
 * - returned records are copies, mutating them has no effect on the store
 * - work passed to runInTransaction sees its own writes; other readers see
 *   all of them or none
 *
 * Used as the DI token, implementations are MongoLedgerStore and InMemoryLedgerStore.
 */
export abstract class LedgerStore {
  abstract getPostpaid(username: string): Promise<PostpaidUserRecord>;

  abstract findPostpaid(username: string): Promise<PostpaidUserRecord | null>;

  abstract listPostpaid(): Promise<PostpaidUserRecord[]>;

  abstract upsertPostpaid(record: PostpaidUserInput): Promise<PostpaidUserRecord>;

  abstract getPrepaid(username: string): Promise<PrepaidUserRecord>;

  abstract findPrepaid(username: string): Promise<PrepaidUserRecord | null>;

  abstract getPrepaidByKey(userKey: string): Promise<PrepaidUserRecord>;

  abstract listPrepaidByOwner(postpaidUserId: string): Promise<PrepaidUserRecord[]>;

  abstract listPrepaid(): Promise<PrepaidUserRecord[]>;

  abstract upsertPrepaid(record: PrepaidUserInput): Promise<PrepaidUserRecord>;

  /**
   * Removes the record and retires its userKey for the lifetime of the store
   */
  abstract deletePrepaid(username: string): Promise<void>;

  /**
   * true if the key belongs to a live prepaid user or was retired
   */
  abstract isUserKeyTaken(userKey: string): Promise<boolean>;

  abstract runInTransaction<T>(work: (tx: LedgerStore) => Promise<T>): Promise<T>;

  abstract healthCheck(): Promise<LedgerStoreHealth>;
}
