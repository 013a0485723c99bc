import type { NextFunction, Request, Response } from 'express';

// Logging configuration
const MAX_LOG_LINE_LENGTH = 80;
const MAX_LOG_LINE_LENGTH_TRUNCATED = 79;

// Response fields that are short enough to be worth logging
const SAFE_LOG_FIELDS = new Set(['id', 'error', 'message', 'success', 'status']);

export function log(message: string, source = 'express'): void {
  const formattedTime = new Date().toLocaleTimeString('en-US', {
    hour: 'numeric',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

/**
 * Summarize a JSON response body for a log line
 * Lists are reduced to their length, objects to their safe fields
 */
export function summarizeResponseForLogging(body: unknown): string {
  if (Array.isArray(body)) {
    return `[${body.length} items]`;
  }

  if (body === null || typeof body !== 'object') {
    return String(JSON.stringify(body));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    if (SAFE_LOG_FIELDS.has(key)) {
      sanitized[key] = value;
    }
  }

  if (Object.keys(sanitized).length === 0) {
    return `[${JSON.stringify(body).length} bytes]`;
  }

  return JSON.stringify(sanitized);
}

export function formatRequestLogLine(
  method: string,
  path: string,
  statusCode: number,
  durationMs: number,
  body: unknown
): string {
  let logLine = `${method} ${path} ${statusCode} in ${durationMs}ms`;
  if (body !== undefined) {
    logLine += ` :: ${summarizeResponseForLogging(body)}`;
  }

  if (logLine.length > MAX_LOG_LINE_LENGTH) {
    logLine = logLine.slice(0, MAX_LOG_LINE_LENGTH_TRUNCATED) + '…';
  }

  return logLine;
}

/**
 * Log one line per finished /api request
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on('finish', () => {
    if (path.startsWith('/api')) {
      log(
        formatRequestLogLine(
          req.method,
          path,
          res.statusCode,
          Date.now() - start,
          capturedJsonResponse
        )
      );
    }
  });

  next();
}
