import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import bcrypt from 'bcryptjs';
import { UserEntity } from '../../../../user/infrastructure/persistence/relational/entities/user.entity';

export interface AdminCredentials {
  name: string;
  email: string;
  username: string;
  password: string;
}

@Injectable()
export class UserSeedService {
  private readonly logger = new Logger(UserSeedService.name);

  constructor(
    @InjectRepository(UserEntity)
    private readonly repository: Repository<UserEntity>,
  ) {}

  /** Creates the admin account unless an admin already exists. */
  async run(credentials: AdminCredentials): Promise<UserEntity | null> {
    const existingAdmins = await this.repository.count({
      where: { admin: true },
    });
    if (existingAdmins > 0) {
      this.logger.log('Skipping admin seed, an admin already exists');
      return null;
    }

    const salt = await bcrypt.genSalt();
    const password = await bcrypt.hash(credentials.password, salt);

    const admin = await this.repository.save(
      this.repository.create({
        name: credentials.name,
        email: credentials.email.toLowerCase(),
        username: credentials.username.toLowerCase(),
        password,
        admin: true,
      }),
    );
    this.logger.log(`Seeded admin ${admin.username}`);

    return admin;
  }
}
