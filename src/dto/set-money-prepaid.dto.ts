import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { UserMoneyDto } from './user-money.dto';

export class SetMoneyPrepaidDto extends UserMoneyDto {
  @ApiPropertyOptional({
    description: 'Move the prepaid user to this postpaid owner',
    example: 'bob',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  ownerUsername?: string;
}
