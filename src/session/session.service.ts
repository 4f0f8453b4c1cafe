import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import crypto from 'crypto';
import { Repository } from 'typeorm';
import { SessionEntity } from './infrastructure/persistence/relational/entities/session.entity';
import { UserEntity } from '../user/infrastructure/persistence/relational/entities/user.entity';
import { NullableType } from '../utils/types/nullable.type';
import { AllConfigType } from '../config/config.type';
import {
  CookieOptions,
  getSessionCookieOptions,
} from '../utils/cookie-config';
import { SIGN_IN_PATH } from '../core/constants/constant';

@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    @InjectRepository(SessionEntity)
    private readonly sessionRepository: Repository<SessionEntity>,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  getCookieName(): string {
    return this.configService.getOrThrow('auth.sessionCookie', {
      infer: true,
    });
  }

  getCookieOptions(): CookieOptions {
    return getSessionCookieOptions(
      this.configService.getOrThrow('app.backendDomain', { infer: true }),
      this.configService.getOrThrow('auth.sessionMaxAge', { infer: true }),
    );
  }

  /** Absolute URL of the sign-in entry point. */
  getSignInUrl(): string {
    const backendDomain = this.configService.getOrThrow('app.backendDomain', {
      infer: true,
    });
    return `${backendDomain.replace(/\/+$/, '')}${SIGN_IN_PATH}`;
  }

  async create(user: UserEntity): Promise<SessionEntity> {
    const session = await this.sessionRepository.save(
      this.sessionRepository.create({
        user,
        secureId: crypto.randomUUID(),
      }),
    );

    this.logger.debug(`Created session ${session.id} for user ${user.id}`);

    return session;
  }

  async findBySecureId(
    secureId: SessionEntity['secureId'],
  ): Promise<NullableType<SessionEntity>> {
    return this.sessionRepository.findOne({
      where: { secureId },
    });
  }

  async findUserBySecureId(
    secureId: SessionEntity['secureId'],
  ): Promise<NullableType<UserEntity>> {
    const session = await this.findBySecureId(secureId);
    return session?.user ?? null;
  }

  async deleteBySecureId(secureId: SessionEntity['secureId']): Promise<void> {
    await this.sessionRepository.softDelete({ secureId });
  }
}
