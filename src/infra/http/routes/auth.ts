import { Router } from 'express';
import { LoginUseCase, parseCredentials } from '../../../application/auth/login.js';
import type { ConnectionPool } from '../../db/session.js';
import { moduleLogger } from '../../logger.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { readJsonObject } from '../middleware/jsonBody.js';
import { createLoginRateLimiter } from '../middleware/rateLimit.js';
import { methodNotAllowed } from '../middleware/routing.js';
import { createUserStore } from '../userStore.js';

/**
 * @openapi
 * /login:
 *   post:
 *     tags: [Auth]
 *     summary: Check an email and password pair
 *     description: No session or token is issued; success only confirms the credentials.
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Credentials match
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 status: { type: string, example: success }
 *                 message: { type: string, example: 'Login successful!' }
 *                 user_id: { type: integer }
 *       400:
 *         description: Invalid JSON or missing credentials
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Unknown email or wrong password (indistinguishable)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/LoginFailure' }
 *       429:
 *         description: Too many login attempts
 */

const log = moduleLogger('auth');

export function createAuthRoutes(pool: ConnectionPool, loginPerMinute: number) {
  const router = Router();
  const users = createUserStore(pool);

  router
    .route('/login')
    .post(
      createLoginRateLimiter(loginPerMinute),
      asyncHandler(async (req, res) => {
        const credentials = parseCredentials(readJsonObject(req));
        const { userId } = await users('An error occurred during login.', (repo) =>
          new LoginUseCase(repo).execute(credentials)
        );
        log.info({ userId }, 'Login successful');
        res.status(200).json({ status: 'success', message: 'Login successful!', user_id: userId });
      })
    )
    .all(methodNotAllowed(['POST']));

  return router;
}
