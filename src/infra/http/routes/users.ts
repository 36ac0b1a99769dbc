import { Router } from 'express';
import { CreateUserUseCase, parseCreateUser } from '../../../application/users/createUser.js';
import { UpdateUserUseCase, parseUserChanges } from '../../../application/users/updateUser.js';
import { DeleteUserUseCase } from '../../../application/users/deleteUser.js';
import { UserQueries, parseSearchTerm } from '../../../application/users/queries.js';
import type { ConnectionPool } from '../../db/session.js';
import { moduleLogger } from '../../logger.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { readJsonObject } from '../middleware/jsonBody.js';
import { methodNotAllowed, withUserId } from '../middleware/routing.js';
import { createUserStore } from '../userStore.js';

/**
 * @openapi
 * /users:
 *   get:
 *     tags: [Users]
 *     summary: List all users
 *     responses:
 *       200:
 *         description: Users in id order
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 users:
 *                   type: array
 *                   items: { $ref: '#/components/schemas/UserProfile' }
 *       500:
 *         description: Store error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   post:
 *     tags: [Users]
 *     summary: Create a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, email, password]
 *             properties:
 *               name: { type: string }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 message: { type: string, example: 'User created successfully!' }
 *                 id: { type: integer }
 *       400:
 *         description: Invalid JSON, missing data, invalid email or weak password
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /user/{id}:
 *   parameters:
 *     - in: path
 *       name: id
 *       required: true
 *       schema: { type: integer, minimum: 0 }
 *   get:
 *     tags: [Users]
 *     summary: Get a user by id
 *     responses:
 *       200:
 *         description: The user
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 user: { $ref: '#/components/schemas/UserProfile' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/NotFoundResponse' }
 *   put:
 *     tags: [Users]
 *     summary: Update a user's name and/or email
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               name: { type: string }
 *               email: { type: string, format: email }
 *     responses:
 *       200:
 *         description: User updated
 *       400:
 *         description: Invalid JSON, no fields or invalid email
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/NotFoundResponse' }
 *       409:
 *         description: Email already in use by another user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   delete:
 *     tags: [Users]
 *     summary: Delete a user
 *     responses:
 *       204:
 *         description: Deleted
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/NotFoundResponse' }
 *
 * /search:
 *   get:
 *     tags: [Users]
 *     summary: Search users by name (case-insensitive substring)
 *     parameters:
 *       - in: query
 *         name: name
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Matching users, possibly none
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 users:
 *                   type: array
 *                   items: { $ref: '#/components/schemas/UserProfile' }
 *       400:
 *         description: Missing name parameter
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const log = moduleLogger('users');

export function createUserRoutes(pool: ConnectionPool) {
  const router = Router();
  const users = createUserStore(pool);

  router
    .route('/users')
    .get(
      asyncHandler(async (_req, res) => {
        const list = await users('Failed to retrieve users.', (repo) =>
          new UserQueries(repo).listUsers()
        );
        res.status(200).json({ users: list });
      })
    )
    .post(
      asyncHandler(async (req, res) => {
        const command = parseCreateUser(readJsonObject(req));
        const { id } = await users('Failed to create user.', (repo) =>
          new CreateUserUseCase(repo).execute(command)
        );
        log.info({ userId: id }, 'User created');
        res.status(201).json({ message: 'User created successfully!', id });
      })
    )
    .all(methodNotAllowed(['GET', 'POST']));

  router
    .route('/user/:id(\\d+)')
    .get(
      withUserId(async (id, _req, res) => {
        const user = await users('Failed to retrieve user.', (repo) =>
          new UserQueries(repo).getUser(id)
        );
        res.status(200).json({ user });
      })
    )
    .put(
      withUserId(async (id, req, res) => {
        const changes = parseUserChanges(readJsonObject(req));
        await users('Failed to update user.', (repo) =>
          new UpdateUserUseCase(repo).execute({ id, changes })
        );
        log.info({ userId: id }, 'User updated');
        res.status(200).json({ message: 'User updated successfully!' });
      })
    )
    .delete(
      withUserId(async (id, _req, res) => {
        await users('Failed to delete user.', (repo) => new DeleteUserUseCase(repo).execute(id));
        log.info({ userId: id }, 'User deleted');
        res.status(204).end();
      })
    )
    .all(methodNotAllowed(['GET', 'PUT', 'DELETE']));

  router
    .route('/search')
    .get(
      asyncHandler(async (req, res) => {
        const term = parseSearchTerm(req.query.name);
        const matches = await users('Failed to search users.', (repo) =>
          new UserQueries(repo).searchByName(term)
        );
        log.debug({ term, count: matches.length }, 'Search completed');
        res.status(200).json({ users: matches });
      })
    )
    .all(methodNotAllowed(['GET']));

  return router;
}
