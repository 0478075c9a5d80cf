import type { Router } from 'express';
import {
  asyncHandler,
  extractAuthContext,
  parseId,
  registerResourceRoutes,
  requireAuthenticated,
  sendOutcome,
  type ResourceHandler,
} from '@shelfwise/platform-core';
import type { Comment, CommentInput, CommentQuery, NewComment, NewPost, Post, PostInput, PostQuery } from '@domains/social';
import { SocialError } from '@application/errors';
import type { SocialController } from '../controllers/SocialController';

interface SocialRouteDeps {
  socialController: SocialController;
  posts: ResourceHandler<Post, PostInput, NewPost, PostQuery>;
  comments: ResourceHandler<Comment, CommentInput, NewComment, CommentQuery>;
}

function withPost(body: unknown, postId: string | undefined): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return body;
  return { ...body, post: postId };
}

export function registerSocialRoutes(router: Router, deps: SocialRouteDeps): void {
  const { socialController, posts, comments } = deps;
  const signedIn = requireAuthenticated();

  registerResourceRoutes(router, '/posts', posts);
  router.post('/posts/:id/like', signedIn, (req, res) => socialController.like(req, res));
  router.post('/posts/:id/unlike', signedIn, (req, res) => socialController.unlike(req, res));

  // nested comment routes answer 404 for a post that does not exist
  router.get(
    '/posts/:id/comments',
    asyncHandler(async (req, res) => {
      const ctx = extractAuthContext(req);
      const post = await posts.retrieve(ctx, req.params.id);
      if (post.statusCode !== 200) return sendOutcome(res, post);
      return sendOutcome(res, await comments.list(ctx, { ...req.query, post: req.params.id }));
    })
  );
  router.post(
    '/posts/:id/comments',
    asyncHandler(async (req, res) => {
      const ctx = extractAuthContext(req);
      const post = await posts.retrieve(ctx, req.params.id);
      if (post.statusCode !== 200) return sendOutcome(res, post);
      return sendOutcome(res, await comments.create(ctx, withPost(req.body ?? {}, req.params.id)));
    })
  );
  registerResourceRoutes(router, '/comments', comments);

  router.get(
    '/users/:id/posts',
    asyncHandler(async (req, res) => {
      if (parseId(req.params.id) === null) throw SocialError.notFound('User', req.params.id);
      return sendOutcome(res, await posts.list(extractAuthContext(req), { ...req.query, author: req.params.id }));
    })
  );

  router.get('/feed', signedIn, (req, res) => socialController.feed(req, res));

  router.post('/notifications/read-all', signedIn, (req, res) => socialController.markAllRead(req, res));
  router.get('/notifications', signedIn, (req, res) => socialController.listNotifications(req, res));
  router.post('/notifications/:id/read', signedIn, (req, res) => socialController.markRead(req, res));
}
