import { instanceToPlain } from 'class-transformer';
import { BaseEntity, CreateDateColumn, UpdateDateColumn } from 'typeorm';

export class EntityRelationalHelper extends BaseEntity {
  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  toJSON() {
    return instanceToPlain(this);
  }
}
