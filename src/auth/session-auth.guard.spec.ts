import { ExecutionContext, ForbiddenException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Test } from '@nestjs/testing';
import { SessionAuthGuard } from './session-auth.guard';
import { AdminGuard } from './admin.guard';
import { SignInRequiredException } from './exceptions/sign-in-required.exception';
import { SessionService } from '../session/session.service';
import { AuthenticatedRequest } from '../core/interfaces/authenticated-request.interface';
import {
  mockAdmin,
  mockSession,
  mockSessionService,
  mockUser,
} from '../test/mocks';

function contextFor(request: Partial<AuthenticatedRequest>): ExecutionContext {
  return new ExecutionContextHost([request, {}, jest.fn()]);
}

describe('SessionAuthGuard', () => {
  let guard: SessionAuthGuard;

  beforeEach(async () => {
    jest.clearAllMocks();
    mockSessionService.findBySecureId.mockResolvedValue(mockSession);

    const module = await Test.createTestingModule({
      providers: [
        SessionAuthGuard,
        { provide: SessionService, useValue: mockSessionService },
      ],
    }).compile();

    guard = module.get(SessionAuthGuard);
  });

  it('attaches the user and session for a known session cookie', async () => {
    const request: Partial<AuthenticatedRequest> = {
      cookies: { session_id: mockSession.secureId },
    };

    await expect(guard.canActivate(contextFor(request))).resolves.toBe(true);
    expect(request.user).toBe(mockUser);
    expect(request.session).toBe(mockSession);
    expect(mockSessionService.findBySecureId).toHaveBeenCalledWith(
      mockSession.secureId,
    );
  });

  it('asks for sign-in without a session cookie', async () => {
    const error = await guard
      .canActivate(contextFor({ cookies: {} }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SignInRequiredException);
    expect(error instanceof SignInRequiredException && error.signInUrl).toBe(
      'http://localhost:3000/session/new',
    );
    expect(mockSessionService.findBySecureId).not.toHaveBeenCalled();
  });

  it('asks for sign-in for an unknown session', async () => {
    mockSessionService.findBySecureId.mockResolvedValue(null);

    await expect(
      guard.canActivate(contextFor({ cookies: { session_id: 'expired' } })),
    ).rejects.toThrow(SignInRequiredException);
  });
});

describe('AdminGuard', () => {
  const guard = new AdminGuard();

  it('lets admins through', () => {
    expect(guard.canActivate(contextFor({ user: mockAdmin }))).toBe(true);
  });

  it('forbids other users', () => {
    expect(() => guard.canActivate(contextFor({ user: mockUser }))).toThrow(
      ForbiddenException,
    );
  });

  it('forbids requests without a user', () => {
    expect(() => guard.canActivate(contextFor({}))).toThrow(
      ForbiddenException,
    );
  });
});
