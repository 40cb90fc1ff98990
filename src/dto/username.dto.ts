import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class UsernameDto {
  @ApiProperty({
    description: 'Username of the target user',
    example: 'alice',
    maxLength: 100,
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  username!: string;
}
