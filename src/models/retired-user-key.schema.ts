import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type RetiredUserKeyDocument = HydratedDocument<RetiredUserKey>;

/**
 * Keys of deleted prepaid users.
 * A retired key is never handed out again, so a leaked key
 * cannot be replayed against a newer prepaid account.
 */
@Schema({
  collection: 'retired_user_keys',
})
export class RetiredUserKey {
  @Prop({ required: true })
  userKey!: string;

  @Prop({ required: true })
  username!: string;

  @Prop({ default: Date.now })
  retiredAt!: Date;
}

export const RetiredUserKeySchema = SchemaFactory.createForClass(RetiredUserKey);

RetiredUserKeySchema.index({ userKey: 1 }, { unique: true });

// Retired keys are append-only
RetiredUserKeySchema.pre(['updateOne', 'findOneAndUpdate', 'deleteOne'], function (next) {
  next(new Error('Retired user keys are immutable and cannot be modified or deleted'));
});
