import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { Principal, isPrincipal } from '../interfaces/principal.interface';

/**
 * CurrentPrincipal decorator
 *
 * Principal set by JwtStrategy, or null on routes guarded by OptionalJwtGuard
 *
 * Usage:
 * @Get('me')
 * @UseGuards(JwtAuthGuard)
 * async getMe(@CurrentPrincipal() principal: Principal | null) { ... }
 */
export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Principal | null => {
    const request = ctx.switchToHttp().getRequest<Request>();
    return isPrincipal(request.user) ? request.user : null;
  },
);
