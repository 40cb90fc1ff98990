import { ExecutionContext, Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { Request } from 'express';

const READ_ONLY_METHODS = new Set(['GET', 'HEAD']);

/**
 * ThrottlerGuard that skips read-only requests.
 * Every mutating route, including POST /drink with a user key, is throttled.
 */
@Injectable()
export class SkipGetThrottleGuard extends ThrottlerGuard {
  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();

    if (READ_ONLY_METHODS.has(request.method)) {
      return true;
    }

    return super.canActivate(context);
  }
}
