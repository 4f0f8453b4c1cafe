import { IsEnum, IsInt, IsOptional, IsPositive } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { EventFilter } from '../../core/constants/constant';

export class QueryEventDto {
  @ApiPropertyOptional({
    enum: EventFilter,
    default: EventFilter.Upcoming,
  })
  @IsOptional()
  @IsEnum(EventFilter)
  filter?: EventFilter;

  @ApiPropertyOptional({
    description: 'How many events the recent filter returns',
    default: 3,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  limit?: number;
}
