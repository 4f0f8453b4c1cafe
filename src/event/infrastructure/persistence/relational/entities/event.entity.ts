import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  OneToMany,
  Index,
  ValueTransformer,
} from 'typeorm';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { RegistrationEntity } from '../../../../../registration/infrastructure/persistence/relational/entities/registration.entity';
import { LikeEntity } from '../../../../../like/infrastructure/persistence/relational/entities/like.entity';
import { UserEntity } from '../../../../../user/infrastructure/persistence/relational/entities/user.entity';

// Postgres hands decimals back as strings.
export const decimalTransformer: ValueTransformer = {
  to: (value?: number | null) => value,
  from: (value?: string | number | null) =>
    value === null || value === undefined ? value : Number(value),
};

@Entity({ name: 'events' })
export class EventEntity extends EntityRelationalHelper {
  @ApiProperty()
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty()
  @Column({ type: 'varchar', length: 255 })
  @Index()
  name!: string;

  @ApiProperty()
  @Column({ type: 'varchar', length: 255 })
  location!: string;

  @ApiProperty()
  @Column({ type: 'text' })
  description!: string;

  @ApiProperty({ example: 10.0 })
  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    default: 0,
    transformer: decimalTransformer,
  })
  price!: number;

  @ApiProperty({ example: 50 })
  @Column({ type: 'int' })
  capacity!: number;

  @ApiProperty()
  @Column({ type: Date })
  @Index()
  startsAt!: Date;

  @ApiPropertyOptional({ example: 'bbq.png' })
  @Column({ type: 'varchar', length: 255, nullable: true })
  imageFileName?: string | null;

  @OneToMany(() => RegistrationEntity, (registration) => registration.event, {
    cascade: true,
  })
  registrations?: RegistrationEntity[];

  @OneToMany(() => LikeEntity, (like) => like.event, {
    cascade: true,
  })
  likes?: LikeEntity[];

  /**
   * Filled by queries that map the registration count
   * (`loadRelationCountAndMap`); not a column.
   */
  registrationsCount?: number;

  get registrationCount(): number {
    return this.registrationsCount ?? this.registrations?.length ?? 0;
  }

  get likers(): UserEntity[] {
    return (this.likes ?? []).map((like) => like.user);
  }

  isFree(): boolean {
    return Number(this.price) === 0;
  }

  spotsLeft(): number {
    return this.capacity - this.registrationCount;
  }

  isSoldOut(): boolean {
    return this.spotsLeft() <= 0;
  }
}
