import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  Injectable,
  InternalServerErrorException,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LedgerOperation } from '../../common/enums/ledger-operation.enum';
import { UserKind } from '../../common/enums/user-kind.enum';
import { InactiveUserException } from '../../common/exceptions/ledger.exceptions';
import { Principal } from '../../auth/interfaces/principal.interface';
import {
  assertAllowed,
  GroupPolicy,
  groupPolicyFromConfig,
  isAdmin,
  isMember,
} from '../../auth/policy/ledger-policy';
import {
  LedgerStore,
  PostpaidUserRecord,
  PrepaidUserRecord,
} from '../ledger-store/ledger-store';
import { RedisLockService } from '../redis-lock/redis-lock.service';
import {
  POSTPAID_DEBT_ALLOWED,
  PREPAID_OVERDRAFT_ALLOWED,
  USER_KEY_MAX_ATTEMPTS,
  postpaidLockKey,
  prepaidLockKey,
} from './ledger.constants';
import { generateUserKey } from './user-key';

export type DrinkTarget =
  | { type: 'self-postpaid' }
  | { type: 'self-prepaid' }
  | { type: 'prepaid-key'; userKey: string };

export type DrinkResult =
  | { kind: UserKind.POSTPAID; user: PostpaidUserRecord }
  | { kind: UserKind.PREPAID; user: PrepaidUserRecord };

export type Profile =
  | { kind: UserKind.POSTPAID; user: PostpaidUserRecord; prepaidUsers: PrepaidUserRecord[] }
  | { kind: UserKind.PREPAID; user: PrepaidUserRecord };

export interface LedgerStats {
  postpaidUsers: PostpaidUserRecord[];
  prepaidUsers: PrepaidUserRecord[];
}

export interface PayUpResult {
  admin: PostpaidUserRecord;
  target: PostpaidUserRecord;
}

// движок операций над балансами
// все проверки прав и существования до первой записи,
// каждая операция целиком внутри одной транзакции стора
@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);
  private readonly policy: GroupPolicy;
  private readonly activateNewPostpaidUsers: boolean;
  private readonly userKeyBytes: number;

  constructor(
    private readonly store: LedgerStore,
    private readonly redisLockService: RedisLockService,
    private readonly configService: ConfigService,
  ) {
    this.policy = groupPolicyFromConfig(configService);
    this.activateNewPostpaidUsers = configService.get<boolean>(
      'ledger.activateNewPostpaidUsers',
      false,
    );
    this.userKeyBytes = configService.get<number>('ledger.userKeyBytes', 6);
  }

  // постпейд юзер создается при первом входе
  async ensurePostpaidUser(username: string): Promise<PostpaidUserRecord> {
    const existing = await this.store.findPostpaid(username);
    if (existing) {
      return existing;
    }

    try {
      return await this.store.runInTransaction(async (tx) => {
        const again = await tx.findPostpaid(username);
        if (again) {
          return again;
        }
        const created = await tx.upsertPostpaid({
          username,
          money: 0,
          activated: this.activateNewPostpaidUsers,
          lastDrink: null,
        });
        this.logger.log(
          `Created postpaid user ${username} (activated: ${created.activated})`,
        );
        return created;
      });
    } catch (error) {
      // параллельный первый вход, запись уже создана другим запросом
      if (error instanceof ConflictException) {
        return this.store.getPostpaid(username);
      }
      throw error;
    }
  }

  // профиль текущего пользователя
  async getProfile(actor: Principal | null): Promise<Profile> {
    if (!actor) {
      throw new UnauthorizedException('Authentication required');
    }
    const principal = actor;

    if (principal.kind === UserKind.PREPAID) {
      return { kind: UserKind.PREPAID, user: await this.store.getPrepaid(principal.username) };
    }

    return this.store.runInTransaction<Profile>(async (tx) => {
      const user = await tx.getPostpaid(principal.username);
      const prepaidUsers = isMember(principal, this.policy)
        ? await tx.listPrepaidByOwner(user.id)
        : [];
      return { kind: UserKind.POSTPAID, user, prepaidUsers };
    });
  }

  // свои препейд юзеры
  async listOwnPrepaidUsers(actor: Principal | null): Promise<PrepaidUserRecord[]> {
    const principal = this.authorize(actor, LedgerOperation.VIEW_OWN_PREPAID);

    const owner = await this.store.findPostpaid(principal.username);
    if (!owner) {
      return [];
    }
    return this.store.listPrepaidByOwner(owner.id);
  }

  // полный список, один согласованный снимок
  async getStats(actor: Principal | null): Promise<LedgerStats> {
    this.authorize(actor, LedgerOperation.VIEW_LEDGER);

    return this.store.runInTransaction(async (tx) => {
      const postpaidUsers = await tx.listPostpaid();
      const prepaidUsers = await tx.listPrepaid();
      return { postpaidUsers, prepaidUsers };
    });
  }

  // списание за напиток, без нижней границы баланса
  async recordDrink(
    actor: Principal | null,
    target: DrinkTarget,
    price: number,
  ): Promise<DrinkResult> {
    this.assertAmount(price, 'price');

    if (target.type === 'prepaid-key') {
      return this.recordDrinkByKey(target.userKey, price);
    }

    const principal = this.authorize(actor, LedgerOperation.RECORD_DRINK);

    if (target.type === 'self-postpaid') {
      if (principal.kind !== UserKind.POSTPAID) {
        throw new ForbiddenException('Only postpaid users can drink on their own account');
      }
      const user = await this.withUserLocks([postpaidLockKey(principal.username)], async (tx) => {
        const current = await tx.getPostpaid(principal.username);
        this.assertCanDrink(current, price, POSTPAID_DEBT_ALLOWED);
        return tx.upsertPostpaid({
          ...current,
          money: current.money - price,
          lastDrink: new Date(),
        });
      });
      this.logger.log(`Drink for postpaid user ${user.username}, balance ${user.money}`);
      return { kind: UserKind.POSTPAID, user };
    }

    if (principal.kind !== UserKind.PREPAID) {
      throw new ForbiddenException('Log in with a user key to drink as a prepaid user');
    }
    const user = await this.withUserLocks([prepaidLockKey(principal.username)], async (tx) =>
      this.chargePrepaid(tx, await tx.getPrepaid(principal.username), price),
    );
    this.logger.log(`Drink for prepaid user ${user.username}, balance ${user.money}`);
    return { kind: UserKind.PREPAID, user };
  }

  // новый препейд юзер, владелец - текущий участник
  async addPrepaidUser(
    actor: Principal | null,
    username: string,
    startMoney: number,
  ): Promise<PrepaidUserRecord> {
    const principal = this.authorize(actor, LedgerOperation.ADD_PREPAID_USER);
    this.assertAmount(startMoney, 'startMoney');
    if (principal.kind !== UserKind.POSTPAID) {
      throw new ForbiddenException('Prepaid users cannot own prepaid users');
    }

    const created = await this.withUserLocks(
      [postpaidLockKey(principal.username), prepaidLockKey(username)],
      async (tx) => {
        const owner = await tx.getPostpaid(principal.username);
        if (await tx.findPrepaid(username)) {
          throw new ConflictException(`Prepaid user ${username} already exists`);
        }

        return tx.upsertPrepaid({
          username,
          userKey: await this.issueUserKey(tx),
          postpaidUserId: owner.id,
          money: startMoney,
          activated: true,
          lastDrink: null,
        });
      },
    );

    this.logger.log(
      `Prepaid user ${created.username} added by ${principal.username} with ${startMoney} cents`,
    );
    return created;
  }

  // пополнение: владелец или админ, сумма любого знака
  async addMoneyPrepaid(
    actor: Principal | null,
    username: string,
    amount: number,
  ): Promise<PrepaidUserRecord> {
    const principal = this.authorize(actor, LedgerOperation.ADD_MONEY_PREPAID);
    this.assertAmount(amount, 'money');

    const updated = await this.withUserLocks([prepaidLockKey(username)], async (tx) => {
      const prepaid = await tx.getPrepaid(username);

      if (!isAdmin(principal, this.policy)) {
        const owner = await tx.findPostpaid(principal.username);
        if (!owner || owner.id !== prepaid.postpaidUserId) {
          this.logger.warn(
            `User ${principal.username} tried to add money to foreign prepaid user ${username}`,
          );
          throw new ForbiddenException(`Prepaid user ${username} is not yours`);
        }
      }

      return tx.upsertPrepaid({ ...prepaid, money: prepaid.money + amount });
    });

    this.logger.log(`Added ${amount} cents to prepaid user ${username} by ${principal.username}`);
    return updated;
  }

  // админ переводит со своего баланса на баланс пользователя
  async payUp(
    actor: Principal | null,
    username: string,
    amount: number,
  ): Promise<PayUpResult> {
    const principal = this.authorize(actor, LedgerOperation.PAYUP);
    this.assertAmount(amount, 'money');

    // перевод самому себе ничего не меняет
    if (username === principal.username) {
      const self = await this.store.getPostpaid(username);
      return { admin: self, target: self };
    }

    const result = await this.withUserLocks(
      [postpaidLockKey(principal.username), postpaidLockKey(username)],
      async (tx) => {
        const admin = await tx.getPostpaid(principal.username);
        const target = await tx.getPostpaid(username);

        return {
          admin: await tx.upsertPostpaid({ ...admin, money: admin.money - amount }),
          target: await tx.upsertPostpaid({ ...target, money: target.money + amount }),
        };
      },
    );

    this.logger.log(`Payup of ${amount} cents from ${principal.username} to ${username}`);
    return result;
  }

  // абсолютная установка баланса постпейд юзера
  async setMoneyPostpaid(
    actor: Principal | null,
    username: string,
    amount: number,
  ): Promise<PostpaidUserRecord> {
    const principal = this.authorize(actor, LedgerOperation.SET_MONEY);
    this.assertAmount(amount, 'money');

    const updated = await this.withUserLocks([postpaidLockKey(username)], async (tx) => {
      const user = await tx.getPostpaid(username);
      return tx.upsertPostpaid({ ...user, money: amount });
    });

    this.logger.log(`Money of postpaid user ${username} set to ${amount} by ${principal.username}`);
    return updated;
  }

  // абсолютная установка баланса препейд юзера, опционально смена владельца
  async setMoneyPrepaid(
    actor: Principal | null,
    username: string,
    amount: number,
    ownerUsername?: string,
  ): Promise<PrepaidUserRecord> {
    const principal = this.authorize(actor, LedgerOperation.SET_MONEY);
    this.assertAmount(amount, 'money');

    const updated = await this.withUserLocks([prepaidLockKey(username)], async (tx) => {
      const prepaid = await tx.getPrepaid(username);
      const postpaidUserId = ownerUsername
        ? (await tx.getPostpaid(ownerUsername)).id
        : prepaid.postpaidUserId;
      return tx.upsertPrepaid({ ...prepaid, money: amount, postpaidUserId });
    });

    this.logger.log(
      `Money of prepaid user ${username} set to ${amount} by ${principal.username}` +
        (ownerUsername ? `, owner ${ownerUsername}` : ''),
    );
    return updated;
  }

  // переключение activated
  toggleActivated(
    actor: Principal | null,
    username: string,
    kind: UserKind.POSTPAID,
  ): Promise<PostpaidUserRecord>;
  toggleActivated(
    actor: Principal | null,
    username: string,
    kind: UserKind.PREPAID,
  ): Promise<PrepaidUserRecord>;
  async toggleActivated(
    actor: Principal | null,
    username: string,
    kind: UserKind,
  ): Promise<PostpaidUserRecord | PrepaidUserRecord> {
    const principal = this.authorize(actor, LedgerOperation.TOGGLE_ACTIVATED);

    const updated =
      kind === UserKind.POSTPAID
        ? await this.withUserLocks([postpaidLockKey(username)], async (tx) => {
            const user = await tx.getPostpaid(username);
            return tx.upsertPostpaid({ ...user, activated: !user.activated });
          })
        : await this.withUserLocks([prepaidLockKey(username)], async (tx) => {
            const user = await tx.getPrepaid(username);
            return tx.upsertPrepaid({ ...user, activated: !user.activated });
          });

    this.logger.log(
      `${kind} user ${username} ${updated.activated ? 'activated' : 'deactivated'} by ${principal.username}`,
    );
    return updated;
  }

  // удаление препейд юзера, ключ больше никогда не выдается
  async deletePrepaidUser(actor: Principal | null, username: string): Promise<void> {
    const principal = this.authorize(actor, LedgerOperation.DELETE_PREPAID_USER);

    await this.withUserLocks([prepaidLockKey(username)], (tx) => tx.deletePrepaid(username));

    this.logger.log(`Prepaid user ${username} deleted by ${principal.username}`);
  }

  private async recordDrinkByKey(userKey: string, price: number): Promise<DrinkResult> {
    // имя нужно для блокировки, сама запись перечитывается в транзакции
    const { username } = await this.store.getPrepaidByKey(userKey);

    const user = await this.withUserLocks([prepaidLockKey(username)], async (tx) =>
      this.chargePrepaid(tx, await tx.getPrepaidByKey(userKey), price),
    );

    this.logger.log(`Drink for prepaid user ${user.username} by key, balance ${user.money}`);
    return { kind: UserKind.PREPAID, user };
  }

  private chargePrepaid(
    tx: LedgerStore,
    current: PrepaidUserRecord,
    price: number,
  ): Promise<PrepaidUserRecord> {
    this.assertCanDrink(current, price, PREPAID_OVERDRAFT_ALLOWED);
    return tx.upsertPrepaid({
      ...current,
      money: current.money - price,
      lastDrink: new Date(),
    });
  }

  private assertCanDrink(
    user: PostpaidUserRecord | PrepaidUserRecord,
    price: number,
    belowZeroAllowed: boolean,
  ): void {
    if (!user.activated) {
      this.logger.warn(`Inactive user ${user.username} tried to buy a drink`);
      throw new InactiveUserException(user.username);
    }
    if (!belowZeroAllowed && user.money - price < 0) {
      throw new BadRequestException(`Insufficient balance for ${user.username}`);
    }
  }

  private async issueUserKey(tx: LedgerStore): Promise<string> {
    for (let attempt = 0; attempt < USER_KEY_MAX_ATTEMPTS; attempt++) {
      const userKey = generateUserKey(this.userKeyBytes);
      if (!(await tx.isUserKeyTaken(userKey))) {
        return userKey;
      }
    }
    throw new InternalServerErrorException('Failed to generate a unique user key');
  }

  private withUserLocks<T>(
    lockKeys: string[],
    work: (tx: LedgerStore) => Promise<T>,
  ): Promise<T> {
    return this.redisLockService.withLocks(lockKeys, () =>
      this.store.runInTransaction(work),
    );
  }

  private authorize(actor: Principal | null, operation: LedgerOperation): Principal {
    try {
      assertAllowed(actor, operation, this.policy);
      return actor;
    } catch (error) {
      this.logger.warn(
        `Denied ${operation} for ${actor ? actor.username : 'anonymous'}`,
      );
      throw error;
    }
  }

  private assertAmount(amount: number, field: string): void {
    if (!Number.isSafeInteger(amount)) {
      throw new BadRequestException(`${field} must be an integer amount of cents`);
    }
  }
}
