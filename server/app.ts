import express, {
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import cors from 'cors';
import { requestLogger } from './logger';
import { createPostRoutes } from './routes/posts';
import type { IPostStorage } from './storage';
import { getErrorMessage, getErrorStatus } from './utils/error-utils';

export interface AppOptions {
  storage: IPostStorage;
  /** Maximum accepted JSON body size in bytes */
  bodyLimitBytes?: number;
  logRequests?: boolean;
}

const DEFAULT_BODY_LIMIT_BYTES = 1024 * 1024;

/**
 * JSON body parser that answers malformed or oversized input with a JSON
 * error instead of an HTML page
 */
export function createJsonBodyParser(limit: number): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    // We only care about requests that might have a JSON body
    if (
      req.method === 'GET' ||
      req.method === 'HEAD' ||
      req.method === 'OPTIONS' ||
      req.method === 'DELETE'
    ) {
      return next();
    }

    const contentType = req.headers['content-type'];
    if (!contentType || !contentType.includes('application/json')) {
      return next();
    }

    const chunks: Buffer[] = [];
    let totalLength = 0;
    let rejected = false;

    req.on('data', (chunk: Buffer) => {
      if (rejected) return;
      totalLength += chunk.length;
      if (totalLength > limit) {
        rejected = true;
        chunks.length = 0;
        res.status(413).json({ error: 'Request body exceeds limit' });
        return;
      }
      chunks.push(chunk);
    });

    req.on('end', () => {
      if (rejected) return;

      const bodyBuffer = Buffer.concat(chunks);
      if (bodyBuffer.length === 0) {
        req.body = {};
        return next();
      }

      try {
        req.body = JSON.parse(bodyBuffer.toString('utf8'));
      } catch (error) {
        console.warn('[BODY_PARSER] Malformed JSON received:', getErrorMessage(error));
        res.status(400).json({ error: 'Malformed JSON in request body' });
        return;
      }
      next();
    });

    req.on('error', (err) => {
      console.error('[BODY_PARSER] Request stream error:', getErrorMessage(err));
      next(err);
    });
  };
}

export function createApp(options: AppOptions): Express {
  const { storage } = options;
  const app = express();

  // Disable X-Powered-By header to prevent information disclosure
  app.disable('x-powered-by');

  // Any origin may call the API; preflight responses are cached for 24 hours
  app.use(
    cors({
      maxAge: 86400,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Accept'],
    })
  );

  app.use(createJsonBodyParser(options.bodyLimitBytes ?? DEFAULT_BODY_LIMIT_BYTES));

  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.get('/health', async (_req, res, next) => {
    try {
      res.status(200).json({ status: 'ok', posts: await storage.countPosts() });
    } catch (error) {
      next(error);
    }
  });

  app.use('/api/posts', createPostRoutes(storage));

  app.use((req, res) => {
    res.status(404).json({ error: `Route ${req.method} ${req.path} not found` });
  });

  app.use(
    (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = getErrorStatus(err) ?? 500;
      const message =
        status >= 500 ? 'Internal Server Error' : getErrorMessage(err);

      console.error('[ERROR]', { message: getErrorMessage(err), status });

      if (res.headersSent) {
        return;
      }
      res.status(status).json({ error: message });
    }
  );

  return app;
}
