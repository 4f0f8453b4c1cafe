import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { default as request } from 'supertest';
import cookieParser from 'cookie-parser';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { SessionService } from '../session/session.service';
import validationOptions from '../utils/validation-options';
import { mockSession, mockSessionService } from '../test/mocks';

describe('AuthController (HTTP)', () => {
  let app: INestApplication;
  const authService = {
    signIn: jest.fn(),
    signOut: jest.fn(),
  };

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [AuthController],
      providers: [
        { provide: AuthService, useValue: authService },
        { provide: SessionService, useValue: mockSessionService },
      ],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    app.use(cookieParser());
    app.useGlobalPipes(new ValidationPipe(validationOptions));
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    jest.clearAllMocks();
    mockSessionService.findBySecureId.mockResolvedValue(mockSession);
    authService.signIn.mockResolvedValue(mockSession);
    authService.signOut.mockResolvedValue(undefined);
  });

  it('describes the sign-in form at GET /session/new', async () => {
    const response = await request(app.getHttpServer())
      .get('/session/new')
      .expect(200);

    expect(response.body.action).toEqual({ method: 'POST', path: '/session' });
    expect(response.body.fields).toEqual(['emailOrUsername', 'password']);
  });

  it('sets the session cookie on sign in', async () => {
    const response = await request(app.getHttpServer())
      .post('/session')
      .send({ emailOrUsername: ' larry ', password: 'test-password' })
      .expect(200);

    expect(authService.signIn).toHaveBeenCalledWith({
      emailOrUsername: 'larry',
      password: 'test-password',
    });
    expect(response.headers['set-cookie'][0]).toMatch(
      new RegExp(`^session_id=${mockSession.secureId};`),
    );
    expect(response.body.username).toBe('larry');
    expect(response.body).not.toHaveProperty('password');
  });

  it('signs out and clears the cookie', async () => {
    const response = await request(app.getHttpServer())
      .delete('/session')
      .set('Cookie', `session_id=${mockSession.secureId}`)
      .expect(204);

    expect(authService.signOut).toHaveBeenCalledWith(mockSession);
    expect(response.headers['set-cookie'][0]).toMatch(/^session_id=;/);
  });

  it('redirects sign out without a session to the sign-in page', async () => {
    const response = await request(app.getHttpServer())
      .delete('/session')
      .expect(302);

    expect(response.headers.location).toBe(
      'http://localhost:3000/session/new',
    );
    expect(authService.signOut).not.toHaveBeenCalled();
  });
});
