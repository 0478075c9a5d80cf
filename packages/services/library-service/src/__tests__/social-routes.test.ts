import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { createTestContext, seedUser, type SeededUser, type TestContext } from './support/test-app';

describe('social routes', () => {
  let ctx: TestContext;
  let ada: SeededUser;
  let ben: SeededUser;

  beforeEach(async () => {
    ctx = createTestContext();
    ada = await seedUser(ctx, 'ada');
    ben = await seedUser(ctx, 'ben');
  });

  async function postAs(author: SeededUser, title: string): Promise<number> {
    const response = await request(ctx.app)
      .post('/api/posts')
      .set('Authorization', author.authHeader)
      .send({ title, content: `${title} body` });
    expect(response.status).toBe(201);
    return response.body.post.id;
  }

  describe('posts', () => {
    it('should make the caller the author of a new post', async () => {
      const response = await request(ctx.app)
        .post('/api/posts')
        .set('Authorization', ada.authHeader)
        .send({ title: 'First light', content: 'Morning notes.', author: ben.user.id });

      expect(response.status).toBe(201);
      expect(response.body.post).toMatchObject({
        author: ada.user.id,
        author_username: 'ada',
        title: 'First light',
        content: 'Morning notes.',
        like_count: 0,
      });
    });

    it('should refuse anonymous posting', async () => {
      const response = await request(ctx.app).post('/api/posts').send({ title: 'Anon', content: 'Nope' });

      expect(response.status).toBe(401);
      expect(ctx.db.posts.size).toBe(0);
    });

    it("should forbid editing someone else's post", async () => {
      const postId = await postAs(ada, 'Mine');

      const response = await request(ctx.app)
        .patch(`/api/posts/${postId}`)
        .set('Authorization', ben.authHeader)
        .send({ title: 'Hijacked' });

      expect(response.status).toBe(403);
      expect(response.body.message).toBe('You do not have permission to modify this resource.');
      expect((await ctx.repositories.posts.get(postId))?.title).toBe('Mine');
    });

    it('should let a librarian edit but not delete a member post', async () => {
      const librarian = await seedUser(ctx, 'shelver', 'librarian');
      const postId = await postAs(ada, 'Mine');

      const edited = await request(ctx.app)
        .patch(`/api/posts/${postId}`)
        .set('Authorization', librarian.authHeader)
        .send({ title: 'Tidied' });
      const deleted = await request(ctx.app).delete(`/api/posts/${postId}`).set('Authorization', librarian.authHeader);

      expect(edited.status).toBe(200);
      expect(edited.body.post.title).toBe('Tidied');
      expect(deleted.status).toBe(403);
    });

    it('should let the author delete their post', async () => {
      const postId = await postAs(ada, 'Short lived');

      const response = await request(ctx.app).delete(`/api/posts/${postId}`).set('Authorization', ada.authHeader);

      expect(response.status).toBe(200);
      expect(response.body.deleted_post).toEqual({ id: postId, title: 'Short lived', author: 'ada' });
    });

    it('should answer 404 before checking ownership of a missing post', async () => {
      const response = await request(ctx.app)
        .patch('/api/posts/999')
        .set('Authorization', ben.authHeader)
        .send({ title: 'Ghost' });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Post not found');
    });
  });

  describe('likes', () => {
    it("should count a like and notify the post's author", async () => {
      const postId = await postAs(ada, 'Likeable');

      const liked = await request(ctx.app).post(`/api/posts/${postId}/like`).set('Authorization', ben.authHeader);

      expect(liked.status).toBe(200);
      expect(liked.body.message).toBe('Post liked successfully');
      expect(liked.body.post.like_count).toBe(1);

      const inbox = await request(ctx.app).get('/api/notifications').set('Authorization', ada.authHeader);
      expect(inbox.body.count).toBe(1);
      expect(inbox.body.notifications[0]).toMatchObject({
        actor: ben.user.id,
        actor_username: 'ben',
        verb: 'liked your post',
        target_type: 'post',
        target_id: postId,
        is_read: false,
      });
    });

    it('should not notify authors who like their own post', async () => {
      const postId = await postAs(ada, 'Self');

      await request(ctx.app).post(`/api/posts/${postId}/like`).set('Authorization', ada.authHeader);

      expect(ctx.db.notifications.size).toBe(0);
    });

    it('should refuse a second like', async () => {
      const postId = await postAs(ada, 'Once');
      await request(ctx.app).post(`/api/posts/${postId}/like`).set('Authorization', ben.authHeader);

      const again = await request(ctx.app).post(`/api/posts/${postId}/like`).set('Authorization', ben.authHeader);

      expect(again.status).toBe(400);
      expect(again.body.message).toBe('You have already liked this post.');
      expect(ctx.db.likes.size).toBe(1);
    });

    it('should unlike a liked post and refuse unliking twice', async () => {
      const postId = await postAs(ada, 'Fickle');
      await request(ctx.app).post(`/api/posts/${postId}/like`).set('Authorization', ben.authHeader);

      const unliked = await request(ctx.app).post(`/api/posts/${postId}/unlike`).set('Authorization', ben.authHeader);
      const again = await request(ctx.app).post(`/api/posts/${postId}/unlike`).set('Authorization', ben.authHeader);

      expect(unliked.status).toBe(200);
      expect(unliked.body.post.like_count).toBe(0);
      expect(again.status).toBe(400);
      expect(again.body.message).toBe('You have not liked this post.');
    });

    it('should answer 404 for a missing post', async () => {
      const response = await request(ctx.app).post('/api/posts/999/like').set('Authorization', ben.authHeader);

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Post not found: 999');
    });

    it('should require sign-in', async () => {
      const postId = await postAs(ada, 'Public');

      const response = await request(ctx.app).post(`/api/posts/${postId}/like`);

      expect(response.status).toBe(401);
    });
  });

  describe('follows and feed', () => {
    it('should follow idempotently', async () => {
      const first = await request(ctx.app).post(`/api/users/${ben.user.id}/follow`).set('Authorization', ada.authHeader);
      const second = await request(ctx.app).post(`/api/users/${ben.user.id}/follow`).set('Authorization', ada.authHeader);

      expect(first.status).toBe(200);
      expect(first.body).toEqual({
        message: 'You are now following ben.',
        following: { id: ben.user.id, username: 'ben' },
        status: 'success',
      });
      expect(second.status).toBe(200);
      expect(second.body.message).toBe('You are already following ben.');
      expect(ctx.db.follows.size).toBe(1);
    });

    it('should refuse following yourself', async () => {
      const response = await request(ctx.app).post(`/api/users/${ada.user.id}/follow`).set('Authorization', ada.authHeader);

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('You cannot follow yourself.');
    });

    it('should answer 404 when following a missing user', async () => {
      const response = await request(ctx.app).post('/api/users/999/follow').set('Authorization', ada.authHeader);

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('User not found: 999');
    });

    it('should unfollow and refuse unfollowing twice', async () => {
      await ctx.repositories.follows.add(ada.user.id, ben.user.id);

      const first = await request(ctx.app).post(`/api/users/${ben.user.id}/unfollow`).set('Authorization', ada.authHeader);
      const second = await request(ctx.app).post(`/api/users/${ben.user.id}/unfollow`).set('Authorization', ada.authHeader);

      expect(first.body.message).toBe('You have unfollowed ben.');
      expect(second.status).toBe(400);
      expect(second.body.message).toBe('You are not following this user.');
    });

    it('should list followers and following', async () => {
      await ctx.repositories.follows.add(ada.user.id, ben.user.id);

      const followers = await request(ctx.app).get(`/api/users/${ben.user.id}/followers`);
      const following = await request(ctx.app).get(`/api/users/${ada.user.id}/following`);

      expect(followers.body).toMatchObject({ message: 'Followers retrieved successfully', count: 1 });
      expect(followers.body.followers).toEqual([{ id: ada.user.id, username: 'ada' }]);
      expect(following.body.following).toEqual([{ id: ben.user.id, username: 'ben' }]);
    });

    it('should show only followed authors in the feed', async () => {
      const cleo = await seedUser(ctx, 'cleo');
      await postAs(ben, 'From ben');
      await postAs(cleo, 'From cleo');
      await postAs(ben, 'Ben again');
      await ctx.repositories.follows.add(ada.user.id, ben.user.id);

      const response = await request(ctx.app).get('/api/feed').set('Authorization', ada.authHeader);

      expect(response.body.message).toBe('Feed retrieved successfully');
      expect(response.body.count).toBe(2);
      expect(response.body.posts.map((post: { author_username: string }) => post.author_username)).toEqual([
        'ben',
        'ben',
      ]);
    });

    it('should give an empty feed to someone who follows nobody', async () => {
      await postAs(ben, 'Unseen');

      const response = await request(ctx.app).get('/api/feed').set('Authorization', ada.authHeader);

      expect(response.body.count).toBe(0);
      expect(response.body.posts).toEqual([]);
    });
  });

  describe('notifications', () => {
    async function likeTwice(): Promise<void> {
      const first = await postAs(ada, 'One');
      const second = await postAs(ada, 'Two');
      await request(ctx.app).post(`/api/posts/${first}/like`).set('Authorization', ben.authHeader);
      await request(ctx.app).post(`/api/posts/${second}/like`).set('Authorization', ben.authHeader);
    }

    it('should mark one notification read and filter unread', async () => {
      await likeTwice();
      const [first] = [...ctx.db.notifications.keys()];

      const marked = await request(ctx.app)
        .post(`/api/notifications/${first}/read`)
        .set('Authorization', ada.authHeader);
      const unread = await request(ctx.app).get('/api/notifications?unread=true').set('Authorization', ada.authHeader);

      expect(marked.status).toBe(200);
      expect(marked.body.notification.is_read).toBe(true);
      expect(unread.body.count).toBe(1);
    });

    it("should hide another user's notification", async () => {
      await likeTwice();
      const [first] = [...ctx.db.notifications.keys()];

      const response = await request(ctx.app).post(`/api/notifications/${first}/read`).set('Authorization', ben.authHeader);

      expect(response.status).toBe(404);
      expect(ctx.db.notifications.get(first ?? 0)?.isRead).toBe(false);
    });

    it('should mark everything read and report how many changed', async () => {
      await likeTwice();

      const first = await request(ctx.app).post('/api/notifications/read-all').set('Authorization', ada.authHeader);
      const second = await request(ctx.app).post('/api/notifications/read-all').set('Authorization', ada.authHeader);

      expect(first.body).toEqual({ message: 'All notifications marked as read', updated: 2, status: 'success' });
      expect(second.body.updated).toBe(0);
    });
  });

  describe('comments', () => {
    async function commentAs(author: SeededUser, postId: number, content: string): Promise<number> {
      const response = await request(ctx.app)
        .post(`/api/posts/${postId}/comments`)
        .set('Authorization', author.authHeader)
        .send({ content });
      expect(response.status).toBe(201);
      return response.body.comment.id;
    }

    it("should add a comment under a post and list only that post's comments", async () => {
      const postId = await postAs(ada, 'Open thread');
      const otherId = await postAs(ada, 'Elsewhere');
      await commentAs(ada, otherId, 'Unrelated.');

      const created = await request(ctx.app)
        .post(`/api/posts/${postId}/comments`)
        .set('Authorization', ben.authHeader)
        .send({ content: 'Nice one.', post: otherId });
      const listed = await request(ctx.app).get(`/api/posts/${postId}/comments`);

      expect(created.status).toBe(201);
      expect(created.body.comment).toMatchObject({
        post: postId,
        author: ben.user.id,
        author_username: 'ben',
        content: 'Nice one.',
      });
      expect(listed.body).toMatchObject({ message: 'Comments retrieved successfully', count: 1 });
      expect(listed.body.comments[0].content).toBe('Nice one.');
    });

    it('should answer 404 for a missing post', async () => {
      const nested = await request(ctx.app).get('/api/posts/999/comments');
      const direct = await request(ctx.app)
        .post('/api/comments')
        .set('Authorization', ben.authHeader)
        .send({ post: 999, content: 'Hello?' });

      expect(nested.status).toBe(404);
      expect(nested.body.message).toBe('Post not found');
      expect(direct.status).toBe(404);
      expect(direct.body.message).toBe('Post not found: 999');
      expect(ctx.db.comments.size).toBe(0);
    });

    it('should require the post when commenting at the top level', async () => {
      const response = await request(ctx.app)
        .post('/api/comments')
        .set('Authorization', ben.authHeader)
        .send({ content: 'Loose' });

      expect(response.status).toBe(400);
      expect(response.body.errors).toEqual({ post: ['This field is required.'] });
    });

    it('should refuse anonymous comments', async () => {
      const postId = await postAs(ada, 'Public');

      const response = await request(ctx.app).post(`/api/posts/${postId}/comments`).send({ content: 'Anon' });

      expect(response.status).toBe(401);
      expect(ctx.db.comments.size).toBe(0);
    });

    it("should forbid editing someone else's comment", async () => {
      const postId = await postAs(ada, 'Thread');
      const commentId = await commentAs(ada, postId, 'Original');

      const hijack = await request(ctx.app)
        .patch(`/api/comments/${commentId}`)
        .set('Authorization', ben.authHeader)
        .send({ content: 'Hijacked' });
      const own = await request(ctx.app)
        .patch(`/api/comments/${commentId}`)
        .set('Authorization', ada.authHeader)
        .send({ content: 'Edited' });

      expect(hijack.status).toBe(403);
      expect(hijack.body.message).toBe('You do not have permission to modify this resource.');
      expect(own.status).toBe(200);
      expect(own.body.comment).toMatchObject({ content: 'Edited', post: postId });
    });

    it('should delete comments, likes and notifications with their post', async () => {
      const postId = await postAs(ada, 'Doomed');
      await commentAs(ben, postId, 'Bye');
      await request(ctx.app).post(`/api/posts/${postId}/like`).set('Authorization', ben.authHeader);
      expect(ctx.db.notifications.size).toBe(1);

      const response = await request(ctx.app).delete(`/api/posts/${postId}`).set('Authorization', ada.authHeader);

      expect(response.status).toBe(200);
      expect(ctx.db.comments.size).toBe(0);
      expect(ctx.db.likes.size).toBe(0);
      expect(ctx.db.notifications.size).toBe(0);
    });
  });

  describe('tags and per-user posts', () => {
    it('should store tags lowercased without duplicates', async () => {
      const response = await request(ctx.app)
        .post('/api/posts')
        .set('Authorization', ada.authHeader)
        .send({ title: 'Verse', content: 'Lines.', tags: ['Poetry', 'poetry', 'Night'] });

      expect(response.status).toBe(201);
      expect(response.body.post.tags).toEqual(['poetry', 'night']);
    });

    it('should filter posts by tag', async () => {
      await request(ctx.app)
        .post('/api/posts')
        .set('Authorization', ada.authHeader)
        .send({ title: 'Verse', content: 'Lines.', tags: ['poetry'] });
      await postAs(ben, 'Untagged');

      const response = await request(ctx.app).get('/api/posts?tag=Poetry');

      expect(response.body.count).toBe(1);
      expect(response.body.posts[0].title).toBe('Verse');
      expect(response.body.available_filters).toEqual(['author', 'tag']);
    });

    it("should list one user's posts", async () => {
      await postAs(ada, 'By ada');
      await postAs(ben, 'By ben');

      const response = await request(ctx.app).get(`/api/users/${ben.user.id}/posts`);

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(1);
      expect(response.body.posts[0]).toMatchObject({ title: 'By ben', author_username: 'ben' });
    });

    it('should answer 404 for a malformed user id', async () => {
      const response = await request(ctx.app).get('/api/users/abc/posts');

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('User not found: abc');
    });
  });
});
