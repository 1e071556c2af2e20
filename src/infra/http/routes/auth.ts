import { Router } from 'express';
import { z } from 'zod';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import type { TokenSettings } from '../../../application/auth/tokens.js';
import { PASSWORD_MAX_LENGTH, PASSWORD_MIN_LENGTH } from '../../../domain/auth/password.js';
import { EMAIL_MAX_LENGTH } from '../../../domain/auth/user.js';
import type { UserRepo } from '../../db/userRepo.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /register:
 *   post:
 *     tags: [Auth]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email, maxLength: 255 }
 *               password: { type: string, minLength: 6, maxLength: 100 }
 *     responses:
 *       201:
 *         description: User created
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Email already registered
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /login:
 *   post:
 *     tags: [Auth]
 *     summary: Exchange credentials for an access token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email, maxLength: 255 }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 access_token: { type: string }
 *                 token_type: { type: string, example: bearer }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       401:
 *         description: Invalid email or password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const registerBodySchema = z.object({
  email: z.string().email().max(EMAIL_MAX_LENGTH),
  password: z.string().min(PASSWORD_MIN_LENGTH).max(PASSWORD_MAX_LENGTH),
});

const loginBodySchema = z.object({
  email: z.string().email().max(EMAIL_MAX_LENGTH),
  password: z.string(),
});

export interface AuthRoutesDeps {
  userRepo: UserRepo;
  tokenSettings: TokenSettings;
}

export function createAuthRoutes({ userRepo, tokenSettings }: AuthRoutesDeps) {
  const router = Router();
  const registerUseCase = new RegisterUseCase(userRepo);
  const loginUseCase = new LoginUseCase(userRepo, tokenSettings);

  router.post(
    '/register',
    validate({ body: registerBodySchema }),
    asyncHandler(async (req, res) => {
      const body = registerBodySchema.parse(req.body);
      await registerUseCase.execute(body);
      res.status(201).json({ message: 'registered' });
    })
  );

  router.post(
    '/login',
    createLoginRateLimiter(),
    validate({ body: loginBodySchema }),
    asyncHandler(async (req, res) => {
      const body = loginBodySchema.parse(req.body);
      const result = await loginUseCase.execute(body);
      res.status(200).json({
        access_token: result.accessToken,
        token_type: result.tokenType,
      });
    })
  );

  return router;
}
