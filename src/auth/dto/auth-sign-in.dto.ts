import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';
import { Transform } from 'class-transformer';

export class AuthSignInDto {
  @ApiProperty({
    description: 'Email address or username',
    example: 'larry@example.com',
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @IsNotEmpty()
  emailOrUsername!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  password!: string;
}
