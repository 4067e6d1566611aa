// Express provides routing for user registration endpoints.
import express from 'express';
// nanoid generates short, URL-safe ids for user records.
import { nanoid } from 'nanoid';
import { BusinessError } from '../errors/httpError';
import { fromZodError } from '../errors/validation';
import { handle } from '../http/handle';
import { writeJson } from '../http/writeJson';
import type { ErrorLog } from '../logger';
import { CreateUserSchema } from '../schemas/apiSchemas';
import type { UserRepository } from '../storage/userRepository';

// Express router for registering and reading users; validation failures surface as 422 envelopes.
export function createUsersRouter(users: UserRepository, log: ErrorLog): express.Router {
  const router = express.Router();

  // POST /users
  router.post(
    '/',
    handle((req, res) => {
      const parsed = CreateUserSchema.safeParse(req.body ?? {});
      if (!parsed.success) return fromZodError(parsed.error);
      const { username, email } = parsed.data;
      if (users.findByUsername(username)) {
        return new BusinessError(409, 'username is already taken');
      }
      const record = { id: nanoid(14), username, email, createdAt: new Date().toISOString() };
      users.insert(record);
      return writeJson(res, 201, { id: record.id, username, email });
    }, log)
  );

  // GET /users/:id
  router.get(
    '/:id',
    handle((req, res) => {
      const user = users.get(req.params.id);
      if (!user) return new BusinessError(404, 'user not found');
      return writeJson(res, 200, { id: user.id, username: user.username, email: user.email });
    }, log)
  );

  return router;
}
