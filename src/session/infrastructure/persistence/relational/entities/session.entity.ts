import {
  Entity,
  Index,
  ManyToOne,
  PrimaryGeneratedColumn,
  DeleteDateColumn,
  Column,
} from 'typeorm';
import { UserEntity } from '../../../../../user/infrastructure/persistence/relational/entities/user.entity';

import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';

@Entity({
  name: 'sessions',
})
export class SessionEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => UserEntity, {
    eager: true,
    onDelete: 'CASCADE',
  })
  @Index()
  user!: UserEntity;

  /**
   * Random UUID v4 handed to the client in the session cookie. The numeric
   * `id` never leaves the server.
   */
  @Column({ type: 'varchar', length: 36, unique: true })
  @Index()
  secureId!: string;

  @DeleteDateColumn()
  deletedAt?: Date | null;
}
