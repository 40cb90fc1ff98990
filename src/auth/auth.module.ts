import { Module } from '@nestjs/common';
import { JwtModule, JwtModuleOptions } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { JwtStrategy } from './strategies/jwt.strategy';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { OptionalJwtGuard } from './guards/optional-jwt.guard';
import { LedgerPolicyGuard } from './guards/ledger-policy.guard';
import { LedgerModule } from '../services/ledger/ledger.module';

/**
 * AuthModule
 *
 * Bearer token verification, principal resolution (implicit postpaid
 * account creation), prepaid key login and the policy guard.
 */
@Module({
  imports: [
    PassportModule.register({ defaultStrategy: 'jwt' }),

    JwtModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService): JwtModuleOptions => ({
        secret: configService.get<string>('jwt.secret', 'default-secret-key'),
        signOptions: {
          expiresIn: configService.get<string>('jwt.expiresIn', '12h'),
        },
      }),
      inject: [ConfigService],
    }),

    // ensurePostpaidUser on first login
    LedgerModule,
  ],
  controllers: [AuthController],
  providers: [
    AuthService,
    JwtStrategy,
    JwtAuthGuard,
    OptionalJwtGuard,
    LedgerPolicyGuard,
  ],
  exports: [
    AuthService,
    JwtAuthGuard,
    OptionalJwtGuard,
    LedgerPolicyGuard,
    JwtModule,
  ],
})
export class AuthModule {}
