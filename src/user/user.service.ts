import {
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import bcrypt from 'bcryptjs';
import { Repository } from 'typeorm';
import { CreateUserDto } from './dto/create-user.dto';
import { NullableType } from '../utils/types/nullable.type';
import { UserEntity } from './infrastructure/persistence/relational/entities/user.entity';
import { EventEntity } from '../event/infrastructure/persistence/relational/entities/event.entity';
import { AuditLoggerService } from '../logger/audit-logger.provider';

export interface UserProfile {
  user: UserEntity;
  registeredEvents: EventEntity[];
  likedEvents: EventEntity[];
}

@Injectable()
export class UserService {
  private readonly auditLogger = AuditLoggerService.getInstance();
  private readonly logger = new Logger(UserService.name);

  constructor(
    @InjectRepository(UserEntity)
    private readonly usersRepository: Repository<UserEntity>,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async create(createUserDto: CreateUserDto): Promise<UserEntity> {
    const email = createUserDto.email.toLowerCase();
    const username = createUserDto.username.toLowerCase();

    const existing = await this.usersRepository.findOne({
      where: [{ email }, { username }],
      select: ['id', 'email', 'username'],
    });
    if (existing) {
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors:
          existing.email === email
            ? { email: 'emailAlreadyExists' }
            : { username: 'usernameAlreadyExists' },
      });
    }

    const salt = await bcrypt.genSalt();
    const password = await bcrypt.hash(createUserDto.password, salt);

    const user = await this.usersRepository.save(
      this.usersRepository.create({
        name: createUserDto.name,
        email,
        username,
        password,
      }),
    );

    this.logger.debug(`Created user ${user.id} (${user.username})`);
    this.auditLogger.log('user created', { userId: user.id });
    this.eventEmitter.emit('user.created', { userId: user.id });

    return user;
  }

  async findByEmailOrUsername(
    emailOrUsername: string,
  ): Promise<NullableType<UserEntity>> {
    const identifier = emailOrUsername.trim().toLowerCase();
    if (!identifier) return null;

    return this.usersRepository.findOne({
      where: [{ email: identifier }, { username: identifier }],
    });
  }

  /** The user together with the events they registered for and liked. */
  async findProfile(id: UserEntity['id']): Promise<UserProfile> {
    const user = await this.usersRepository.findOne({
      where: { id },
      relations: {
        registrations: { event: true },
        likes: { event: true },
      },
    });

    if (!user) {
      throw new NotFoundException(`User with id ${id} not found`);
    }

    return {
      user,
      registeredEvents: (user.registrations ?? []).map(
        (registration) => registration.event,
      ),
      likedEvents: (user.likes ?? []).map((like) => like.event),
    };
  }
}
