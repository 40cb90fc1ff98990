import { IsInt } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import { toCents } from '../common/utils/money';
import { UsernameDto } from './username.dto';

/**
 * Amounts arrive in currency units ("5.00", "5,00" or 5) and are
 * converted to cents before validation.
 */
export class UserMoneyDto extends UsernameDto {
  @ApiProperty({
    description: 'Amount in currency units, converted to cents',
    type: String,
    example: '5.00',
  })
  @Transform(({ value }) => toCents(value))
  @IsInt({ message: 'money must be a decimal amount' })
  money!: number;
}
