import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class PrepaidLoginDto {
  @ApiProperty({
    description: 'Secret key of the prepaid user',
    example: 'q2Xc0d9a',
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  userKey!: string;
}
