import type { RequestHandler, Router } from 'express';
import { requireAuthenticated } from '@shelfwise/platform-core';
import type { AuthController } from '../controllers/AuthController';

interface AuthRouteDeps {
  authController: AuthController;
  /** Applied to register and login only. */
  credentialLimiter: RequestHandler;
}

export function registerAuthRoutes(router: Router, deps: AuthRouteDeps): void {
  const { authController, credentialLimiter } = deps;

  router.post('/auth/register', credentialLimiter, (req, res) => authController.register(req, res));
  router.post('/auth/login', credentialLimiter, (req, res) => authController.login(req, res));
  router.get('/auth/me', requireAuthenticated(), (req, res) => authController.getCurrentUser(req, res));

  router.patch('/profile', requireAuthenticated(), (req, res) => authController.updateProfile(req, res));
}
