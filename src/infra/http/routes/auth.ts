import { Router } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import type { TokenService } from '../../../application/auth/tokens.js';
import {
  PASSWORD_MIN_LENGTH,
  USERNAME_MAX_LENGTH,
  USERNAME_MIN_LENGTH,
  isValidUsernameLength,
  type User,
  type UserRepository,
} from '../../../domain/auth/user.js';
import type { TraceLogger } from '../../logging/traceLogger.js';
import { requireAuth, requireUser, type AuthRequest } from '../middleware/auth.js';
import { requestLogger } from '../middleware/requestId.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /auth/signup:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user and receive an access token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password]
 *             properties:
 *               username: { type: string, minLength: 2, maxLength: 50 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 6 }
 *     responses:
 *       200:
 *         description: User created
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TokenResponse' }
 *       400:
 *         description: Validation error, or username/email already taken
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /auth/signin:
 *   post:
 *     tags: [Auth]
 *     summary: Sign in and receive an access token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/TokenResponse' }
 *       401:
 *         description: Invalid email or password
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /auth/me:
 *   get:
 *     tags: [Auth]
 *     summary: Current authenticated user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/UserResponse' }
 *       401:
 *         description: Not authenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const signupBodySchema = z.object({
  username: z.string().refine(isValidUsernameLength, {
    message: `Username must be between ${USERNAME_MIN_LENGTH} and ${USERNAME_MAX_LENGTH} characters`,
  }),
  email: z.string().email(),
  password: z.string().min(PASSWORD_MIN_LENGTH),
});

const signinBodySchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
});

export interface UserResponse {
  id: string;
  username: string;
  email: string;
  created_at: string;
}

export interface TokenResponse {
  access_token: string;
  token_type: string;
  user: UserResponse;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    created_at: user.createdAt.toISOString(),
  };
}

export interface AuthRoutesDeps {
  users: UserRepository;
  tokens: TokenService;
  logger: TraceLogger;
}

export function createAuthRoutes({ users, tokens, logger }: AuthRoutesDeps) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(users);
  const loginUseCase = new LoginUseCase(users);

  const tokenResponse = (user: User): TokenResponse => ({
    access_token: tokens.issue(user.id),
    token_type: tokens.tokenType,
    user: toUserResponse(user),
  });

  router.post(
    '/signup',
    validate({ body: signupBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const body = signupBodySchema.parse(req.body);
      const log = requestLogger(req, logger);
      log.operation('User Signup Attempt', { username: body.username, email: body.email });

      const user = await registerUseCase.execute(body, log);
      res.status(200).json(tokenResponse(user));
    })
  );

  router.post(
    '/signin',
    validate({ body: signinBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const body = signinBodySchema.parse(req.body);
      const log = requestLogger(req, logger);
      log.operation('User Signin Attempt', { email: body.email });

      const user = await loginUseCase.execute(body, log);
      res.status(200).json(tokenResponse(user));
    })
  );

  router.get('/me', requireAuth, (req: AuthRequest, res) => {
    res.json(toUserResponse(requireUser(req)));
  });

  return router;
}
