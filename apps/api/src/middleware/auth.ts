import { timingSafeEqual } from 'node:crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';

const BEARER_PREFIX = /^bearer\s+/i;

/**
 * Token carried by an Authorization header, with or without the Bearer scheme
 */
export function extractToken(header: string): string {
  return header.replace(BEARER_PREFIX, '').trim();
}

/**
 * Constant-time comparison; different lengths never match
 */
export function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}

/**
 * Shared-token authentication for device and dashboard clients.
 */
export function requireApiToken(apiToken: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiToken) {
      res.status(500).json({ error: 'Authentication not configured' });
      return;
    }

    const header = req.headers.authorization;
    if (!header) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }

    if (!tokensMatch(extractToken(header), apiToken)) {
      console.warn(`[auth] Rejected request to ${req.method} ${req.originalUrl}`);
      res.status(401).json({ error: 'Invalid credentials' });
      return;
    }

    next();
  };
}
