import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { EventEntity } from '../infrastructure/persistence/relational/entities/event.entity';

export class LikerDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  username!: string;
}

export class EventResponseDto {
  @ApiProperty()
  id!: number;

  @ApiProperty()
  name!: string;

  @ApiProperty()
  description!: string;

  @ApiProperty()
  location!: string;

  @ApiProperty()
  price!: number;

  @ApiProperty()
  capacity!: number;

  @ApiProperty()
  startsAt!: Date;

  @ApiPropertyOptional()
  imageFileName?: string | null;

  @ApiProperty()
  free!: boolean;

  @ApiProperty()
  soldOut!: boolean;

  @ApiProperty()
  spotsLeft!: number;

  @ApiProperty()
  registrationsCount!: number;

  @ApiPropertyOptional({ type: [LikerDto] })
  likers?: LikerDto[];

  static fromEntity(event: EventEntity): EventResponseDto {
    const response = new EventResponseDto();
    response.id = event.id;
    response.name = event.name;
    response.description = event.description;
    response.location = event.location;
    response.price = event.price;
    response.capacity = event.capacity;
    response.startsAt = event.startsAt;
    response.imageFileName = event.imageFileName ?? null;
    response.free = event.isFree();
    response.soldOut = event.isSoldOut();
    response.spotsLeft = event.spotsLeft();
    response.registrationsCount = event.registrationCount;
    if (event.likes) {
      response.likers = event.likers.map(({ id, name, username }) => ({
        id,
        name,
        username,
      }));
    }
    return response;
  }
}
