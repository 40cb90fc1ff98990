import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ApiModule } from './api/api.module';
import { LedgerStoreModule } from './services/ledger-store/ledger-store.module';
import { RedisLockModule } from './services/redis-lock/redis-lock.module';
import configuration from './config/configuration';
import { SkipGetThrottleGuard } from './common/guards/skip-get-throttle.guard';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        pinoHttp: {
          level: configService.get<string>('logging.level', 'info'),
          transport:
            configService.get<string>('nodeEnv') === 'development'
              ? {
                  target: 'pino-pretty',
                  options: {
                    colorize: true,
                    singleLine: false,
                    translateTime: 'SYS:standard',
                  },
                }
              : undefined,
          // bearer tokens must not end up in request logs
          redact: ['req.headers.authorization', 'req.headers.cookie'],
        },
      }),
    }),
    // MongoDB or in-memory, picked by LEDGER_STORE
    LedgerStoreModule.forRoot(),
    // optional, falls back to store transactions
    RedisLockModule,
    ApiModule,
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        throttlers: [
          {
            name: 'short',
            ttl: configService.get<number>('throttle.shortTtl', 1000),
            limit: configService.get<number>('throttle.shortLimit', 10),
          },
          {
            name: 'medium',
            ttl: configService.get<number>('throttle.mediumTtl', 10000),
            limit: configService.get<number>('throttle.mediumLimit', 50),
          },
          {
            name: 'long',
            ttl: configService.get<number>('throttle.longTtl', 60000),
            limit: configService.get<number>('throttle.longLimit', 200),
          },
        ],
      }),
    }),
  ],
  controllers: [AppController],
  providers: [
    AppService,
    // GET requests are read-only and never throttled
    {
      provide: APP_GUARD,
      useClass: SkipGetThrottleGuard,
    },
  ],
})
export class AppModule {}
