import { Global, Module } from '@nestjs/common';
import { RedisLockService } from './redis-lock.service';

/**
 * RedisLockModule
 *
 * Distributed per-user locks for multi-instance deployments
 */
@Global()
@Module({
  providers: [RedisLockService],
  exports: [RedisLockService],
})
export class RedisLockModule {}
