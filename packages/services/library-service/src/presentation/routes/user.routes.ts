import type { Router } from 'express';
import { USER_ROLES } from '@shelfwise/shared-contracts';
import { requireAuthenticated, requireRole } from '@shelfwise/platform-core';
import type { UserController } from '../controllers/UserController';

export function registerUserRoutes(router: Router, userController: UserController): void {
  router.get('/users/:id', (req, res) => userController.getUser(req, res));
  router.patch('/users/:id/role', requireRole(USER_ROLES.ADMIN), (req, res) => userController.changeRole(req, res));

  // Follows
  router.post('/users/:id/follow', requireAuthenticated(), (req, res) => userController.follow(req, res));
  router.post('/users/:id/unfollow', requireAuthenticated(), (req, res) => userController.unfollow(req, res));
  router.get('/users/:id/followers', (req, res) => userController.listFollowers(req, res));
  router.get('/users/:id/following', (req, res) => userController.listFollowing(req, res));
}
