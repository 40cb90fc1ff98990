import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class RecordDrinkDto {
  @ApiPropertyOptional({
    description:
      'Prepaid user key. Without it the drink is charged to the logged-in user.',
    example: 'q2Xc0d9a',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  userKey?: string;
}
