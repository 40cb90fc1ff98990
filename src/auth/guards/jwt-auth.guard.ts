import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * JwtAuthGuard
 * Rejects requests without a valid bearer token (401)
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {}
