import { Transform } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import {
  IsAlphanumeric,
  IsEmail,
  IsNotEmpty,
  IsString,
  MinLength,
} from 'class-validator';
import { lowerCaseTransformer } from '../../utils/transformers/lower-case.transformer';

export class CreateUserDto {
  @ApiProperty({ example: 'Larry Smith', type: String })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ example: 'larry@example.com', type: String })
  @Transform(lowerCaseTransformer)
  @IsNotEmpty()
  @IsEmail()
  email!: string;

  @ApiProperty({ example: 'larry', type: String })
  @Transform(lowerCaseTransformer)
  @IsNotEmpty()
  @IsAlphanumeric()
  username!: string;

  @ApiProperty({ minLength: 10 })
  @IsString()
  @MinLength(10)
  password!: string;
}
