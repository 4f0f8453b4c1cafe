import { Column, Entity, Index, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { Exclude } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { RegistrationEntity } from '../../../../../registration/infrastructure/persistence/relational/entities/registration.entity';
import { LikeEntity } from '../../../../../like/infrastructure/persistence/relational/entities/like.entity';

@Entity({
  name: 'users',
})
export class UserEntity extends EntityRelationalHelper {
  @ApiProperty({
    type: Number,
  })
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty({
    type: String,
    example: 'Larry Smith',
  })
  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @ApiProperty({
    type: String,
    example: 'larry@example.com',
  })
  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @ApiProperty({
    type: String,
    example: 'larry',
  })
  @Index({ unique: true })
  @Column({ type: 'varchar', length: 255 })
  username!: string;

  @Column({ type: 'varchar', length: 255 })
  @Exclude({ toPlainOnly: true })
  password!: string;

  @ApiProperty({
    type: Boolean,
  })
  @Column({ type: 'boolean', default: false })
  admin!: boolean;

  @OneToMany(() => RegistrationEntity, (registration) => registration.user)
  registrations?: RegistrationEntity[];

  @OneToMany(() => LikeEntity, (like) => like.user)
  likes?: LikeEntity[];
}
