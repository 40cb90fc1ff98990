import { DynamicModule, Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import {
  LedgerStoreDriver,
  resolveLedgerStoreDriver,
} from '../../config/configuration';
import { ModelsModule } from '../../models/models.module';
import { InMemoryLedgerStore } from './in-memory-ledger-store.service';
import { LedgerStore } from './ledger-store';
import { MongoLedgerStore } from './mongo-ledger-store.service';

/**
 * LedgerStoreModule
 *
 * Binds the LedgerStore token to the configured driver.
 * The driver is picked when the module graph is built (LEDGER_STORE),
 * so the memory driver never opens a MongoDB connection.
 */
@Global()
@Module({})
export class LedgerStoreModule {
  static forRoot(
    driver: LedgerStoreDriver = resolveLedgerStoreDriver(),
  ): DynamicModule {
    if (driver === 'memory') {
      return {
        module: LedgerStoreModule,
        providers: [{ provide: LedgerStore, useClass: InMemoryLedgerStore }],
        exports: [LedgerStore],
      };
    }

    return {
      module: LedgerStoreModule,
      imports: [
        MongooseModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (configService: ConfigService) => ({
            uri: configService.get<string>('mongodb.uri'),
            // transactions require a replica set
            retryWrites: true,
            retryReads: true,
            maxPoolSize: configService.get<number>('mongodb.maxPoolSize', 20),
            minPoolSize: configService.get<number>('mongodb.minPoolSize', 2),
            maxIdleTimeMS: configService.get<number>('mongodb.maxIdleTimeMS', 30000),
            serverSelectionTimeoutMS: 5000,
            socketTimeoutMS: 45000,
            heartbeatFrequencyMS: 10000,
          }),
        }),
        ModelsModule,
      ],
      providers: [
        MongoLedgerStore,
        { provide: LedgerStore, useExisting: MongoLedgerStore },
      ],
      exports: [LedgerStore],
    };
  }
}
