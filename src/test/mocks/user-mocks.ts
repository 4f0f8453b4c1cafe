import { UserEntity } from '../../user/infrastructure/persistence/relational/entities/user.entity';
import { SessionEntity } from '../../session/infrastructure/persistence/relational/entities/session.entity';

export const mockUser = Object.assign(new UserEntity(), {
  id: 1,
  name: 'Larry Smith',
  email: 'larry@example.com',
  username: 'larry',
  password: 'hashed-password',
  admin: false,
  createdAt: new Date('2026-01-01T00:00:00.000Z'),
  updatedAt: new Date('2026-01-01T00:00:00.000Z'),
});

export const mockAdmin = Object.assign(new UserEntity(), {
  id: 2,
  name: 'Ada Admin',
  email: 'ada@example.com',
  username: 'ada',
  password: 'hashed-password',
  admin: true,
  createdAt: new Date('2026-01-01T00:00:00.000Z'),
  updatedAt: new Date('2026-01-01T00:00:00.000Z'),
});

export const mockSession = Object.assign(new SessionEntity(), {
  id: 7,
  secureId: '00000000-0000-4000-8000-000000000001',
  user: mockUser,
});

export const mockUserService = {
  create: jest.fn().mockResolvedValue(mockUser),
  findByEmailOrUsername: jest.fn().mockResolvedValue(mockUser),
  findProfile: jest.fn(),
};

export const mockSessionService = {
  getCookieName: jest.fn().mockReturnValue('session_id'),
  getCookieOptions: jest.fn().mockReturnValue({
    httpOnly: true,
    secure: false,
    sameSite: 'lax',
    maxAge: 86400000,
  }),
  getSignInUrl: jest
    .fn()
    .mockReturnValue('http://localhost:3000/session/new'),
  create: jest.fn().mockResolvedValue(mockSession),
  findBySecureId: jest.fn().mockResolvedValue(mockSession),
  findUserBySecureId: jest.fn().mockResolvedValue(mockUser),
  deleteBySecureId: jest.fn().mockResolvedValue(undefined),
};
