import { ApiProperty } from '@nestjs/swagger';
import { formatCents } from '../../common/utils/money';
import {
  PostpaidUserRecord,
  PrepaidUserRecord,
} from '../ledger-store/ledger-store';

export class PostpaidUserView {
  @ApiProperty({ example: '665f1c2e9b1d4a0012345678' })
  id!: string;

  @ApiProperty({ example: 'alice' })
  username!: string;

  @ApiProperty({ description: 'Balance in currency units', example: '-1.50' })
  money!: string;

  @ApiProperty({ description: 'Balance in cents', example: -150 })
  moneyCents!: number;

  @ApiProperty()
  activated!: boolean;

  @ApiProperty({ type: String, nullable: true, example: '2026-01-01T12:00:00.000Z' })
  lastDrink!: string | null;
}

export class PrepaidUserView extends PostpaidUserView {
  @ApiProperty({ example: 'q2Xc0d9a' })
  userKey!: string;

  @ApiProperty({ description: 'Owning postpaid user' })
  postpaidUserId!: string;
}

export const toPostpaidView = (user: PostpaidUserRecord): PostpaidUserView => ({
  id: user.id,
  username: user.username,
  money: formatCents(user.money),
  moneyCents: user.money,
  activated: user.activated,
  lastDrink: user.lastDrink ? user.lastDrink.toISOString() : null,
});

export const toPrepaidView = (user: PrepaidUserRecord): PrepaidUserView => ({
  ...toPostpaidView(user),
  userKey: user.userKey,
  postpaidUserId: user.postpaidUserId,
});
