import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createMockRequest, createMockResponse } from '../helpers/express-mocks';
import { createPostHandlers, type PostHandlers } from '../../server/routes/posts';
import { MemoryPostStorage } from '../../server/storage';

describe('Post Route Handlers', () => {
  let storage: MemoryPostStorage;
  let handlers: PostHandlers;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    storage = new MemoryPostStorage();
    handlers = createPostHandlers(storage);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('GET /api/posts', () => {
    it('should return all posts in registry order', async () => {
      const { res, mock } = createMockResponse();

      await handlers.listPosts(createMockRequest(), res);

      expect(mock.statusCode).toBe(200);
      expect(mock.body).toEqual([
        { id: 1, title: 'First post', content: 'This is the first post.' },
        { id: 2, title: 'Second post', content: 'This is the second post.' },
      ]);
    });

    it('should sort by title descending', async () => {
      const { res, mock } = createMockResponse();

      await handlers.listPosts(
        createMockRequest({ query: { sort: 'title', direction: 'desc' } }),
        res
      );

      expect(mock.body).toEqual([
        { id: 2, title: 'Second post', content: 'This is the second post.' },
        { id: 1, title: 'First post', content: 'This is the first post.' },
      ]);
    });

    it('should treat direction case-insensitively', async () => {
      const { res, mock } = createMockResponse();

      await handlers.listPosts(
        createMockRequest({ query: { sort: 'content', direction: 'DESC' } }),
        res
      );

      expect(mock.statusCode).toBe(200);
      expect(mock.body).toEqual([
        { id: 2, title: 'Second post', content: 'This is the second post.' },
        { id: 1, title: 'First post', content: 'This is the first post.' },
      ]);
    });

    it('should sort ascending for unknown directions', async () => {
      await storage.createPost({ title: 'a post', content: 'x' });
      const { res, mock } = createMockResponse();

      await handlers.listPosts(
        createMockRequest({ query: { sort: 'title', direction: 'sideways' } }),
        res
      );

      expect(mock.statusCode).toBe(200);
      expect(mock.body).toEqual([
        { id: 3, title: 'a post', content: 'x' },
        { id: 1, title: 'First post', content: 'This is the first post.' },
        { id: 2, title: 'Second post', content: 'This is the second post.' },
      ]);
    });

    it('should ignore unknown sort fields', async () => {
      await storage.createPost({ title: 'a post', content: 'x' });
      const { res, mock } = createMockResponse();

      await handlers.listPosts(
        createMockRequest({ query: { sort: 'id', direction: 'desc' } }),
        res
      );

      expect(mock.statusCode).toBe(200);
      expect(mock.body).toEqual([
        { id: 1, title: 'First post', content: 'This is the first post.' },
        { id: 2, title: 'Second post', content: 'This is the second post.' },
        { id: 3, title: 'a post', content: 'x' },
      ]);
    });
  });

  describe('POST /api/posts', () => {
    it('should create a post with the next id', async () => {
      const { res, mock } = createMockResponse();

      await handlers.createPost(
        createMockRequest({
          method: 'POST',
          body: { title: 'Third post', content: 'Hello' },
        }),
        res
      );

      expect(mock.statusCode).toBe(201);
      expect(mock.body).toEqual({ id: 3, title: 'Third post', content: 'Hello' });
      expect(await storage.countPosts()).toBe(3);
    });

    it('should reject an empty title', async () => {
      const { res, mock } = createMockResponse();

      await handlers.createPost(
        createMockRequest({ method: 'POST', body: { title: '', content: 'Hello' } }),
        res
      );

      expect(mock.statusCode).toBe(400);
      expect(mock.body).toEqual({ error: 'Please fill out required fields' });
      expect(await storage.countPosts()).toBe(2);
    });

    it('should reject missing content', async () => {
      const { res, mock } = createMockResponse();

      await handlers.createPost(
        createMockRequest({ method: 'POST', body: { title: 'Title' } }),
        res
      );

      expect(mock.statusCode).toBe(400);
      expect(mock.body).toEqual({ error: 'Please fill out required fields' });
      expect(await storage.countPosts()).toBe(2);
    });

    it('should reject null fields and a missing body', async () => {
      const first = createMockResponse();
      await handlers.createPost(
        createMockRequest({ method: 'POST', body: { title: null, content: 'x' } }),
        first.res
      );

      const second = createMockResponse();
      await handlers.createPost(createMockRequest({ method: 'POST' }), second.res);

      expect(first.mock.statusCode).toBe(400);
      expect(second.mock.statusCode).toBe(400);
      expect(second.mock.body).toEqual({ error: 'Please fill out required fields' });
    });

    it('should read falsy non-string fields as missing', async () => {
      for (const body of [
        { title: false, content: 'x' },
        { title: 0, content: 'x' },
        { title: 'Title', content: [] },
      ]) {
        const { res, mock } = createMockResponse();

        await handlers.createPost(createMockRequest({ method: 'POST', body }), res);

        expect(mock.statusCode).toBe(400);
        expect(mock.body).toEqual({ error: 'Please fill out required fields' });
      }
      expect(await storage.countPosts()).toBe(2);
    });

    it('should reject fields of the wrong type', async () => {
      const { res, mock } = createMockResponse();

      await handlers.createPost(
        createMockRequest({ method: 'POST', body: { title: 5, content: 'x' } }),
        res
      );

      expect(mock.statusCode).toBe(400);
      expect(mock.body).toEqual({
        error: 'Invalid request: title: Expected string, received number',
      });
      expect(await storage.countPosts()).toBe(2);
    });
  });

  describe('DELETE /api/posts/:postId', () => {
    it('should delete an existing post', async () => {
      const { res, mock } = createMockResponse();

      await handlers.deletePost(
        createMockRequest({ method: 'DELETE', params: { postId: '1' } }),
        res
      );

      expect(mock.statusCode).toBe(200);
      expect(mock.body).toEqual({
        success: 'Post with id (1) has been deleted successfully.',
      });
      expect((await storage.listPosts()).map((p) => p.id)).toEqual([2]);
    });

    it('should return 404 for an unknown id', async () => {
      const { res, mock } = createMockResponse();

      await handlers.deletePost(
        createMockRequest({ method: 'DELETE', params: { postId: '9999' } }),
        res
      );

      expect(mock.statusCode).toBe(404);
      expect(mock.body).toEqual({ error: 'Post with id (9999) do not exist.' });
      expect(await storage.countPosts()).toBe(2);
    });
  });

  describe('PUT /api/posts/:postId', () => {
    it('should update content only', async () => {
      const { res, mock } = createMockResponse();

      await handlers.updatePost(
        createMockRequest({
          method: 'PUT',
          params: { postId: '1' },
          body: { content: 'Rewritten' },
        }),
        res
      );

      expect(mock.statusCode).toBe(200);
      expect(mock.body).toEqual({ message: 'content of post (1) was updated.' });
      expect((await storage.listPosts())[0]).toEqual({
        id: 1,
        title: 'First post',
        content: 'Rewritten',
      });
    });

    it('should update title only', async () => {
      const { res, mock } = createMockResponse();

      await handlers.updatePost(
        createMockRequest({
          method: 'PUT',
          params: { postId: '2' },
          body: { title: 'Renamed', content: '' },
        }),
        res
      );

      expect(mock.body).toEqual({ message: 'title of post (2) was updated.' });
      expect((await storage.listPosts())[1].content).toBe('This is the second post.');
    });

    it('should update both fields', async () => {
      const { res, mock } = createMockResponse();

      await handlers.updatePost(
        createMockRequest({
          method: 'PUT',
          params: { postId: '2' },
          body: { title: 'Renamed', content: 'Rewritten' },
        }),
        res
      );

      expect(mock.statusCode).toBe(200);
      expect(mock.body).toEqual({
        message: 'title and content of post (2) was updated.',
      });
    });

    it('should return 400 when nothing changes', async () => {
      const { res, mock } = createMockResponse();

      await handlers.updatePost(
        createMockRequest({ method: 'PUT', params: { postId: '1' }, body: {} }),
        res
      );

      expect(mock.statusCode).toBe(400);
      expect(mock.body).toEqual({ error: 'Bad request: Nothing was changed' });
    });

    it('should report a missing post before an empty body', async () => {
      const { res, mock } = createMockResponse();

      await handlers.updatePost(
        createMockRequest({ method: 'PUT', params: { postId: '9999' }, body: {} }),
        res
      );

      expect(mock.statusCode).toBe(404);
      expect(mock.body).toEqual({ error: 'Post with id (9999) do not exist.' });
    });

    it('should report a missing post before a falsy field', async () => {
      const { res, mock } = createMockResponse();

      await handlers.updatePost(
        createMockRequest({ method: 'PUT', params: { postId: '9999' }, body: { title: 0 } }),
        res
      );

      expect(mock.statusCode).toBe(404);
      expect(mock.body).toEqual({ error: 'Post with id (9999) do not exist.' });
    });

    it('should report a missing post before a field of the wrong type', async () => {
      const { res, mock } = createMockResponse();

      await handlers.updatePost(
        createMockRequest({ method: 'PUT', params: { postId: '9999' }, body: { title: 5 } }),
        res
      );

      expect(mock.statusCode).toBe(404);
      expect(mock.body).toEqual({ error: 'Post with id (9999) do not exist.' });
    });

    it('should treat a falsy field as no change', async () => {
      const { res, mock } = createMockResponse();

      await handlers.updatePost(
        createMockRequest({ method: 'PUT', params: { postId: '1' }, body: { content: false } }),
        res
      );

      expect(mock.statusCode).toBe(400);
      expect(mock.body).toEqual({ error: 'Bad request: Nothing was changed' });
      expect((await storage.getPost(1))?.content).toBe('This is the first post.');
    });

    it('should reject a field of the wrong type on an existing post', async () => {
      const { res, mock } = createMockResponse();

      await handlers.updatePost(
        createMockRequest({ method: 'PUT', params: { postId: '1' }, body: { title: 5 } }),
        res
      );

      expect(mock.statusCode).toBe(400);
      expect(mock.body).toEqual({
        error: 'Invalid request: title: Expected string, received number',
      });
    });
  });

  describe('GET /api/posts/search', () => {
    it('should find the first post by title ignoring case', async () => {
      const { res, mock } = createMockResponse();

      await handlers.searchPosts(createMockRequest({ query: { title: 'first' } }), res);

      expect(mock.statusCode).toBe(200);
      expect(mock.body).toEqual([
        { id: 1, title: 'First post', content: 'This is the first post.' },
      ]);
    });

    it('should return a post matching both criteria once', async () => {
      const { res, mock } = createMockResponse();

      await handlers.searchPosts(
        createMockRequest({ query: { title: 'second', content: 'SECOND post' } }),
        res
      );

      expect(mock.body).toEqual([
        { id: 2, title: 'Second post', content: 'This is the second post.' },
      ]);
    });

    it('should return an empty list when nothing matches', async () => {
      const { res, mock } = createMockResponse();

      await handlers.searchPosts(createMockRequest({ query: { content: 'zebra' } }), res);

      expect(mock.statusCode).toBe(200);
      expect(mock.body).toEqual([]);
    });

    it('should return 400 without a title or content query', async () => {
      const { res, mock } = createMockResponse();

      await handlers.searchPosts(createMockRequest({ query: { title: '' } }), res);

      expect(mock.statusCode).toBe(400);
      expect(mock.body).toEqual({ error: 'Please provide title or content query' });
    });
  });

  describe('error handling', () => {
    it('should answer 500 when storage fails', async () => {
      vi.spyOn(storage, 'listPosts').mockRejectedValue(new Error('disk on fire'));
      const { res, mock } = createMockResponse();

      await handlers.listPosts(createMockRequest(), res);

      expect(mock.statusCode).toBe(500);
      expect(mock.body).toEqual({ error: 'Internal Server Error' });
      expect(console.error).toHaveBeenCalledWith(
        '[POSTS] Error in %s:',
        'listPosts',
        'disk on fire'
      );
    });
  });
});
