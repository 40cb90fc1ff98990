import {
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { UserKind } from '../common/enums/user-kind.enum';
import { LedgerStore, PrepaidUserRecord } from '../services/ledger-store/ledger-store';
import { LedgerService } from '../services/ledger/ledger.service';
import { JwtPayload, Principal } from './interfaces/principal.interface';

/**
 * AuthService
 *
 * Turns verified token claims into a Principal and issues prepaid session
 * tokens. Member tokens are issued by the identity provider and only
 * verified here (shared secret, see jwt.secret).
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly store: LedgerStore,
    private readonly ledgerService: LedgerService,
  ) {}

  /**
   * Called by JwtStrategy after the signature is verified.
   * A member seen for the first time gets a postpaid account.
   */
  async resolvePrincipal(payload: JwtPayload): Promise<Principal> {
    if (payload.kind === UserKind.PREPAID) {
      return this.resolvePrepaid(payload);
    }

    const username = payload.preferred_username || payload.sub;
    if (!username) {
      throw new UnauthorizedException('Token carries no username');
    }

    await this.ledgerService.ensurePostpaidUser(username);
    return { username, groups: payload.groups ?? [], kind: UserKind.POSTPAID };
  }

  /**
   * Exchange a user key for a prepaid session token
   * @throws UnauthorizedException for unknown or retired keys
   */
  async loginPrepaid(userKey: string): Promise<{
    access_token: string;
    user: PrepaidUserRecord;
  }> {
    let user: PrepaidUserRecord;
    try {
      user = await this.store.getPrepaidByKey(userKey);
    } catch (error) {
      if (error instanceof NotFoundException) {
        this.logger.warn('Prepaid login attempt with an unknown user key');
        throw new UnauthorizedException('Invalid user key');
      }
      throw error;
    }

    const payload: JwtPayload = {
      sub: user.id,
      preferred_username: user.username,
      kind: UserKind.PREPAID,
    };
    const access_token = await this.jwtService.signAsync(payload);

    this.logger.log(`Prepaid user logged in: ${user.username}`);

    return { access_token, user };
  }

  // сессия привязана к id записи, новый юзер с тем же именем ее не получает
  private async resolvePrepaid(payload: JwtPayload): Promise<Principal> {
    const username = payload.preferred_username;
    if (!username || !payload.sub) {
      throw new UnauthorizedException('Token carries no prepaid user');
    }

    const prepaid = await this.store.findPrepaid(username);
    if (!prepaid || prepaid.id !== payload.sub) {
      this.logger.warn(`Rejected stale prepaid session for ${username}`);
      throw new UnauthorizedException('Prepaid session is no longer valid');
    }
    return { username, groups: [], kind: UserKind.PREPAID };
  }
}
