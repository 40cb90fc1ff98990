import { Module } from '@nestjs/common';
import { LedgerService } from './ledger.service';

/**
 * LedgerModule
 * LedgerStore and RedisLockService come from their global modules
 */
@Module({
  providers: [LedgerService],
  exports: [LedgerService],
})
export class LedgerModule {}
