import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { LedgerOperation } from '../../common/enums/ledger-operation.enum';
import { LEDGER_OPERATION_KEY } from '../decorators/require-operation.decorator';
import { isPrincipal } from '../interfaces/principal.interface';
import { assertAllowed, GroupPolicy, groupPolicyFromConfig } from '../policy/ledger-policy';

/**
 * LedgerPolicyGuard
 *
 * Applies the group policy to handlers marked with @RequireOperation,
 * before the body is validated. Handlers without the marker pass.
 * Ownership checks stay in LedgerService.
 */
@Injectable()
export class LedgerPolicyGuard implements CanActivate {
  private readonly logger = new Logger(LedgerPolicyGuard.name);
  private readonly policy: GroupPolicy;

  constructor(
    private readonly reflector: Reflector,
    configService: ConfigService,
  ) {
    this.policy = groupPolicyFromConfig(configService);
  }

  canActivate(context: ExecutionContext): boolean {
    const operation = this.reflector.getAllAndOverride<LedgerOperation | undefined>(
      LEDGER_OPERATION_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!operation) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const principal = isPrincipal(request.user) ? request.user : null;

    try {
      assertAllowed(principal, operation, this.policy);
    } catch (error) {
      this.logger.warn(
        `Denied ${operation} on ${request.method} ${request.path} for ${principal ? principal.username : 'anonymous'}`,
      );
      throw error;
    }
    return true;
  }
}
