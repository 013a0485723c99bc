/**
 * Post Routes
 * CRUD and search handlers over a post registry
 */

import { Router, type Request, type Response } from 'express';
import {
  missingFieldError,
  noChangeError,
  postNotFoundError,
  missingQueryError,
} from '../errors';
import {
  createPostSchema,
  listPostsSchema,
  postIdParamsSchema,
  searchPostsSchema,
  updatePostSchema,
} from '../schemas/post-schemas';
import { deleteMessage, updateMessage } from '../services/post-query';
import type { IPostStorage } from '../storage';
import { handleError } from '../utils/error-handler';

export type PostHandler = (req: Request, res: Response) => Promise<void>;

export interface PostHandlers {
  listPosts: PostHandler;
  createPost: PostHandler;
  deletePost: PostHandler;
  updatePost: PostHandler;
  searchPosts: PostHandler;
}

export function createPostHandlers(storage: IPostStorage): PostHandlers {
  /**
   * List every post, optionally sorted
   * GET /api/posts?sort=title|content&direction=asc|desc
   */
  async function listPosts(req: Request, res: Response): Promise<void> {
    try {
      const sort = listPostsSchema.parse(req.query);
      res.status(200).json(await storage.listPosts(sort));
    } catch (error) {
      handleError(res, error, 'listPosts');
    }
  }

  /**
   * Create a post from { title, content }
   * POST /api/posts
   */
  async function createPost(req: Request, res: Response): Promise<void> {
    try {
      const { title, content } = createPostSchema.parse(req.body);
      if (!title || !content) {
        throw missingFieldError();
      }

      const post = await storage.createPost({ title, content });
      console.log('[POSTS] Created post %d', post.id);
      res.status(201).json(post);
    } catch (error) {
      handleError(res, error, 'createPost');
    }
  }

  /**
   * Delete a post by id
   * DELETE /api/posts/:postId
   */
  async function deletePost(req: Request, res: Response): Promise<void> {
    try {
      const { postId } = postIdParamsSchema.parse(req.params);
      if (!(await storage.deletePost(postId))) {
        throw postNotFoundError(postId);
      }

      console.log('[POSTS] Deleted post %d', postId);
      res.status(200).json({ success: deleteMessage(postId) });
    } catch (error) {
      handleError(res, error, 'deletePost');
    }
  }

  /**
   * Overwrite the title and/or content of a post
   * PUT /api/posts/:postId
   */
  async function updatePost(req: Request, res: Response): Promise<void> {
    try {
      const { postId } = postIdParamsSchema.parse(req.params);
      const parsed = updatePostSchema.safeParse(req.body);
      if (!parsed.success) {
        // An unknown id is reported ahead of a malformed body
        if (!(await storage.getPost(postId))) {
          throw postNotFoundError(postId);
        }
        throw parsed.error;
      }
      const body = parsed.data;

      const result = await storage.updatePost(postId, {
        title: body.title || undefined,
        content: body.content || undefined,
      });

      switch (result.status) {
        case 'not_found':
          throw postNotFoundError(postId);
        case 'unchanged':
          throw noChangeError();
        case 'updated':
          console.log('[POSTS] Updated %s of post %d', result.fields, postId);
          res.status(200).json({ message: updateMessage(postId, result.fields) });
      }
    } catch (error) {
      handleError(res, error, 'updatePost');
    }
  }

  /**
   * Case-insensitive substring search on title and/or content
   * GET /api/posts/search?title=...&content=...
   */
  async function searchPosts(req: Request, res: Response): Promise<void> {
    try {
      const criteria = searchPostsSchema.parse(req.query);
      if (!criteria.title && !criteria.content) {
        throw missingQueryError();
      }

      res.status(200).json(await storage.searchPosts(criteria));
    } catch (error) {
      handleError(res, error, 'searchPosts');
    }
  }

  return { listPosts, createPost, deletePost, updatePost, searchPosts };
}

/**
 * Router for /api/posts
 * The search route is registered before the id routes
 */
export function createPostRoutes(storage: IPostStorage): Router {
  const router = Router();
  const handlers = createPostHandlers(storage);

  router.get('/', handlers.listPosts);
  router.post('/', handlers.createPost);
  router.get('/search', handlers.searchPosts);
  router.delete('/:postId(\\d+)', handlers.deletePost);
  router.put('/:postId(\\d+)', handlers.updatePost);

  return router;
}
