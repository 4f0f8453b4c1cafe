import {
  HttpStatus,
  Injectable,
  Logger,
  UnprocessableEntityException,
} from '@nestjs/common';
import bcrypt from 'bcryptjs';
import { AuthSignInDto } from './dto/auth-sign-in.dto';
import { UserService } from '../user/user.service';
import { SessionService } from '../session/session.service';
import { SessionEntity } from '../session/infrastructure/persistence/relational/entities/session.entity';
import { AuditLoggerService } from '../logger/audit-logger.provider';

@Injectable()
export class AuthService {
  private readonly auditLogger = AuditLoggerService.getInstance();
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly userService: UserService,
    private readonly sessionService: SessionService,
  ) {}

  /**
   * Checks the credentials and opens a new session. Unknown users and wrong
   * passwords get the same error.
   */
  async signIn(signInDto: AuthSignInDto): Promise<SessionEntity> {
    const user = await this.userService.findByEmailOrUsername(
      signInDto.emailOrUsername,
    );

    const isValidPassword =
      user !== null &&
      (await bcrypt.compare(signInDto.password, user.password));

    if (!user || !isValidPassword) {
      this.logger.debug(`Failed sign in for ${signInDto.emailOrUsername}`);
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: {
          emailOrUsername: 'Invalid email/username and password combination',
        },
      });
    }

    const session = await this.sessionService.create(user);
    this.auditLogger.log('user signed in', { userId: user.id });

    return session;
  }

  async signOut(session: SessionEntity): Promise<void> {
    await this.sessionService.deleteBySecureId(session.secureId);
    this.auditLogger.log('user signed out', { userId: session.user.id });
  }
}
