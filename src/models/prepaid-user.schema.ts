import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Schema as MongooseSchema, Types } from 'mongoose';
import { PostpaidUser } from './postpaid-user.schema';

export type PrepaidUserDocument = HydratedDocument<PrepaidUser>;

/**
 * PrepaidUser model
 *
 * Pre-funded sub-account owned by exactly one postpaid user.
 * Identified at the point of sale by its secret userKey.
 *
 * Invariants:
 * - userKey is globally unique and never reused (see RetiredUserKey)
 * - postpaidUserId references an existing PostpaidUser
 */
@Schema({
  timestamps: true,
  collection: 'users_prepaid',
})
export class PrepaidUser {
  @Prop({ required: true, immutable: true })
  username!: string;

  /**
   * Secret token, never returned in listings to anyone but owner/admin
   */
  @Prop({ required: true })
  userKey!: string;

  @Prop({
    required: true,
    type: MongooseSchema.Types.ObjectId,
    ref: PostpaidUser.name,
  })
  postpaidUserId!: Types.ObjectId;

  /**
   * Balance in cents, overdraft is allowed
   */
  @Prop({
    required: true,
    default: 0,
    validate: {
      validator: Number.isInteger,
      message: 'money must be an integer amount of cents',
    },
  })
  money!: number;

  @Prop({ required: true, default: true })
  activated!: boolean;

  @Prop({ type: Date, default: null })
  lastDrink!: Date | null;
}

export const PrepaidUserSchema = SchemaFactory.createForClass(PrepaidUser);

PrepaidUserSchema.index({ username: 1 }, { unique: true });
PrepaidUserSchema.index({ userKey: 1 }, { unique: true });
PrepaidUserSchema.index({ postpaidUserId: 1, _id: 1 }); // owner listings
