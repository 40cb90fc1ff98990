import {
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { isObservable, lastValueFrom } from 'rxjs';

/**
 * OptionalJwtGuard
 *
 * Validates the bearer token when one is sent, lets the request through
 * without a principal otherwise. Used by POST /drink, where a user key can
 * stand in for a login.
 *
 * Usage:
 * @UseGuards(OptionalJwtGuard)
 * async endpoint(@CurrentPrincipal() principal: Principal | null) { ... }
 */
@Injectable()
export class OptionalJwtGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(OptionalJwtGuard.name);

  async canActivate(context: ExecutionContext): Promise<boolean> {
    try {
      const result = super.canActivate(context);
      await (isObservable(result) ? lastValueFrom(result) : result);
    } catch (error) {
      // store failures while resolving the principal still fail the request
      if (!(error instanceof UnauthorizedException)) {
        throw error;
      }
      this.logger.debug(`Continuing without principal: ${error.message}`);
    }
    return true;
  }
}
