import { Request } from 'express';
import { UserEntity } from '../../user/infrastructure/persistence/relational/entities/user.entity';
import { SessionEntity } from '../../session/infrastructure/persistence/relational/entities/session.entity';

export interface AuthenticatedRequest extends Request {
  user?: UserEntity;
  session?: SessionEntity;
}
