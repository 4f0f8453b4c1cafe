import { Entity, ManyToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { EventEntity } from '../../../../../event/infrastructure/persistence/relational/entities/event.entity';
import { UserEntity } from '../../../../../user/infrastructure/persistence/relational/entities/user.entity';

@Entity({ name: 'likes' })
@Unique('UQ_likes_event_user', ['event', 'user'])
export class LikeEntity extends EntityRelationalHelper {
  @ApiProperty()
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => EventEntity, (event) => event.likes, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  event!: EventEntity;

  @ManyToOne(() => UserEntity, (user) => user.likes, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  user!: UserEntity;
}
