import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import {
  PostpaidUser,
  PostpaidUserSchema,
  PrepaidUser,
  PrepaidUserSchema,
  RetiredUserKey,
  RetiredUserKeySchema,
} from './index';

/**
 * Models module
 * Registers all Mongoose schemas, imported by the Mongo ledger store
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: PostpaidUser.name, schema: PostpaidUserSchema },
      { name: PrepaidUser.name, schema: PrepaidUserSchema },
      { name: RetiredUserKey.name, schema: RetiredUserKeySchema },
    ]),
  ],
  exports: [MongooseModule],
})
export class ModelsModule {}
