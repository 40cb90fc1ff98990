import { Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { AuthService } from '../auth.service';
import { JwtPayload, Principal } from '../interfaces/principal.interface';

/**
 * JwtStrategy
 *
 * Verifies bearer tokens (HS256, jwt.secret) and resolves them to a Principal
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly authService: AuthService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get<string>('jwt.secret', 'default-secret-key'),
    });
  }

  async validate(payload: JwtPayload): Promise<Principal> {
    return this.authService.resolvePrincipal(payload);
  }
}
