import { timingSafeEqual } from "node:crypto";
import type { RequestHandler, Request, Response, NextFunction } from "express";

// Module augmentation: attach clientId to Express requests
declare global {
  namespace Express {
    interface Request {
      clientId?: string;
    }
  }
}

const ANONYMOUS_CLIENT = "anonymous";

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

function lookupClient(
  apiKeys: Record<string, string>,
  key: string,
): string | undefined {
  for (const [candidate, clientId] of Object.entries(apiKeys)) {
    if (safeEqual(candidate, key)) return clientId;
  }
  return undefined;
}

/**
 * Bearer API-key check. With no keys configured every request passes and is
 * rate limited as a single anonymous client.
 */
export function createAuthMiddleware(
  apiKeys: Record<string, string>,
): RequestHandler {
  const open = Object.keys(apiKeys).length === 0;

  return (req: Request, res: Response, next: NextFunction) => {
    if (open) {
      req.clientId = ANONYMOUS_CLIENT;
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader) {
      res.status(401).json({ error: "Missing Authorization header" });
      return;
    }

    const parts = authHeader.split(" ");
    if (parts.length !== 2 || parts[0] !== "Bearer" || !parts[1]) {
      res
        .status(401)
        .json({
          error: "Invalid Authorization format. Expected: Bearer <key>",
        });
      return;
    }

    const clientId = lookupClient(apiKeys, parts[1]);
    if (!clientId) {
      res.status(401).json({ error: "Invalid API key" });
      return;
    }

    req.clientId = clientId;
    next();
  };
}

export type RateLimiter = RequestHandler & { shutdown: () => void };

export function createRateLimiter(maxPerMinute: number): RateLimiter {
  const windowMs = 60_000;
  const timestamps = new Map<string, number[]>();

  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [clientId, times] of timestamps) {
      const valid = times.filter((t) => now - t < windowMs);
      if (valid.length === 0) {
        timestamps.delete(clientId);
      } else {
        timestamps.set(clientId, valid);
      }
    }
  }, windowMs);
  cleanupInterval.unref();

  const handler: RequestHandler = (req, res, next) => {
    const clientId = req.clientId;
    if (!clientId) {
      next();
      return;
    }

    const now = Date.now();
    const validTimes = (timestamps.get(clientId) ?? []).filter(
      (t) => now - t < windowMs,
    );

    if (validTimes.length >= maxPerMinute) {
      const oldestInWindow = validTimes[0] ?? now;
      const retryAfterMs = oldestInWindow + windowMs - now;
      res.setHeader("Retry-After", String(Math.ceil(retryAfterMs / 1000)));
      res.status(429).json({ error: "Rate limit exceeded", retryAfterMs });
      return;
    }

    validTimes.push(now);
    timestamps.set(clientId, validTimes);
    next();
  };

  return Object.assign(handler, {
    shutdown: () => clearInterval(cleanupInterval),
  });
}
