import { Column, Entity, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { EventEntity } from '../../../../../event/infrastructure/persistence/relational/entities/event.entity';
import { UserEntity } from '../../../../../user/infrastructure/persistence/relational/entities/user.entity';
import { HowHeard } from '../../../../../core/constants/constant';

@Entity({ name: 'registrations' })
export class RegistrationEntity extends EntityRelationalHelper {
  @ApiProperty()
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty({ enum: HowHeard })
  @Column({ type: 'varchar', length: 50 })
  howHeard!: HowHeard;

  @ManyToOne(() => EventEntity, (event) => event.registrations, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  event!: EventEntity;

  @ManyToOne(() => UserEntity, (user) => user.registrations, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  user!: UserEntity;
}
