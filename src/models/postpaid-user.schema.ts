import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type PostpaidUserDocument = HydratedDocument<PostpaidUser>;

/**
 * PostpaidUser model
 *
 * Billed after consumption, money may go negative (debt).
 * Created implicitly the first time the member logs in.
 *
 * All balance mutations MUST go through LedgerService
 */
@Schema({
  timestamps: true,
  collection: 'users_postpaid',
})
export class PostpaidUser {
  @Prop({ required: true, immutable: true })
  username!: string;

  /**
   * Balance in cents, signed
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

  /**
   * Deactivated users can view their balance but not buy drinks
   */
  @Prop({ required: true, default: false })
  activated!: boolean;

  @Prop({ type: Date, default: null })
  lastDrink!: Date | null;
}

export const PostpaidUserSchema = SchemaFactory.createForClass(PostpaidUser);

PostpaidUserSchema.index({ username: 1 }, { unique: true });
