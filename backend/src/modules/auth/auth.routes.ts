/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/users', controller.register.bind(controller));

  app.post('/sessions', controller.login.bind(controller));
  app.delete('/sessions', controller.logout.bind(controller));

  app.get('/profile', controller.profile.bind(controller));

  app.post('/reset_password', controller.requestPasswordReset.bind(controller));
  app.put('/reset_password', controller.updatePassword.bind(controller));
}
