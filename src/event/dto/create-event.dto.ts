import {
  IsDate,
  IsInt,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  Min,
  MinLength,
  ValidateIf,
} from 'class-validator';
import { Transform, Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  EVENT_DESCRIPTION_MIN_LENGTH,
  IMAGE_FILE_NAME_REGEX,
  NOT_BLANK_REGEX,
} from '../../core/constants/constant';
import { numericStringTransformer } from '../../utils/transformers/numeric-string.transformer';

export class CreateEventDto {
  @ApiProperty({
    description: 'The name of the event',
    example: 'BugSmash',
  })
  @IsString()
  @Matches(NOT_BLANK_REGEX, { message: "name can't be blank" })
  name!: string;

  @ApiProperty({
    description: `What happens at the event, at least ${EVENT_DESCRIPTION_MIN_LENGTH} characters`,
  })
  @IsString()
  @Matches(NOT_BLANK_REGEX, { message: "description can't be blank" })
  @MinLength(EVENT_DESCRIPTION_MIN_LENGTH, {
    message: `description is too short (minimum is ${EVENT_DESCRIPTION_MIN_LENGTH} characters)`,
  })
  description!: string;

  @ApiProperty({
    description: 'Where the event takes place',
    example: 'Denver, CO',
  })
  @IsString()
  @Matches(NOT_BLANK_REGEX, { message: "location can't be blank" })
  location!: string;

  @ApiProperty({
    description: 'Ticket price, 0 for a free event',
    example: 10.0,
  })
  @Transform(numericStringTransformer)
  @IsNumber(
    { allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 },
    { message: 'price is not a number' },
  )
  @Min(0, { message: 'price must be greater than or equal to 0' })
  price!: number;

  @ApiProperty({
    description: 'Number of available spots',
    example: 50,
  })
  @Transform(numericStringTransformer)
  @IsInt({ message: 'capacity must be an integer' })
  @IsPositive({ message: 'capacity must be greater than 0' })
  capacity!: number;

  @ApiProperty({
    description: 'When the event starts',
    type: Date,
    example: '2026-11-15T18:00:00.000Z',
  })
  @Type(() => Date)
  @IsDate({ message: 'startsAt must be a valid date' })
  startsAt!: Date;

  @ApiPropertyOptional({
    description: 'Image shown with the event (png, jpg or gif)',
    example: 'bugsmash.png',
  })
  @IsOptional()
  @ValidateIf((event) => event.imageFileName !== '')
  @IsString()
  @Matches(IMAGE_FILE_NAME_REGEX, {
    message: 'imageFileName must reference a GIF, JPG, or PNG image',
  })
  imageFileName?: string | null;
}
