import { ApiProperty } from '@nestjs/swagger';
import { IsEnum } from 'class-validator';
import { HowHeard } from '../../core/constants/constant';

export class CreateRegistrationDto {
  @ApiProperty({
    enum: HowHeard,
    example: HowHeard.Newsletter,
    description: 'How the attendee heard about the event',
  })
  @IsEnum(HowHeard)
  howHeard!: HowHeard;
}
