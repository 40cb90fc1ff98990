import { IsInt } from 'class-validator';
import { Transform } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import { toCents } from '../common/utils/money';
import { UsernameDto } from './username.dto';

export class AddPrepaidUserDto extends UsernameDto {
  @ApiProperty({
    description: 'Starting balance in currency units',
    type: String,
    example: '10.00',
  })
  @Transform(({ value }) => toCents(value))
  @IsInt({ message: 'startMoney must be a decimal amount' })
  startMoney!: number;
}
