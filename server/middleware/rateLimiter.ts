/**
 * Rate Limiting Middleware
 *
 * Tiers:
 * - SSE streaming: 10/min per IP, max 3 concurrent
 * - Plan creation: 20/min per IP
 * - General API: 100/min per IP
 */

import rateLimit from "express-rate-limit";
import type { RequestHandler } from "express";
import type { IncomingHttpHeaders } from "node:http";

// ============================================================================
// CONFIGURATION
// ============================================================================

/** Maximum concurrent SSE connections per IP */
export const MAX_CONCURRENT_SSE_PER_IP = 3;

// ============================================================================
// RATE LIMITERS
// ============================================================================

/**
 * SSE streaming rate limiter
 * 10 new streams per minute per IP
 */
export const sseRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 10,
  message: {
    message: "Too many streaming requests. Please wait before starting another stream.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

/**
 * Plan creation rate limiter
 * 20 requests per minute per IP
 */
export const planCreationRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 20,
  message: {
    message: "Too many plan creation requests. Please wait before creating another plan.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

/**
 * General API rate limiter (fallback)
 * 100 requests per minute per IP
 */
export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 100,
  message: {
    message: "Too many requests. Please slow down.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

// ============================================================================
// CONCURRENT SSE LIMITER
// ============================================================================

/** The parts of a request the IP lookup reads. */
export interface ClientAddress {
  headers: IncomingHttpHeaders;
  ip?: string;
  socket?: { remoteAddress?: string };
}

/** The parts of a response the concurrency limiter touches. */
export interface StreamSlotResponse {
  on(event: "close" | "finish", listener: () => void): unknown;
  status(code: number): { json(body: unknown): unknown };
}

export type SseConcurrencyLimiter = (req: ClientAddress, res: StreamSlotResponse, next: () => void) => void;

/**
 * Limits concurrent SSE connections per IP; 429 once an IP holds `maxPerIP`
 * open streams. The slot is released once, on whichever of close/finish fires first.
 */
export function createSseConcurrencyLimiter(
  maxPerIP: number = MAX_CONCURRENT_SSE_PER_IP,
  connections: Map<string, number> = new Map()
): SseConcurrencyLimiter {
  return (req, res, next) => {
    const ip = getClientIP(req);
    const currentCount = connections.get(ip) ?? 0;

    if (currentCount >= maxPerIP) {
      console.log(`[RateLimit] SSE concurrency limit reached for IP ${ip} (${currentCount}/${maxPerIP})`);
      res.status(429).json({
        message: `Too many concurrent streams. Maximum ${maxPerIP} allowed per IP.`,
        currentStreams: currentCount,
      });
      return;
    }

    connections.set(ip, currentCount + 1);

    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      const count = connections.get(ip) ?? 1;
      if (count <= 1) {
        connections.delete(ip);
      } else {
        connections.set(ip, count - 1);
      }
    };

    res.on("close", release);
    res.on("finish", release);

    next();
  };
}

const sseConnectionsByIP = new Map<string, number>();

export const sseConcurrencyLimiter: RequestHandler = createSseConcurrencyLimiter(MAX_CONCURRENT_SSE_PER_IP, sseConnectionsByIP);

/**
 * Combined SSE limiter (concurrency + rate)
 */
export const sseProtection: RequestHandler[] = [sseConcurrencyLimiter, sseRateLimiter];

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Client IP, honouring the first X-Forwarded-For hop
 */
export function getClientIP(req: ClientAddress): string {
  const forwarded = req.headers["x-forwarded-for"];
  if (forwarded) {
    const ips = typeof forwarded === "string" ? forwarded : forwarded[0];
    const first = ips?.split(",")[0]?.trim();
    if (first) return first;
  }
  return req.ip || req.socket?.remoteAddress || "unknown";
}

/**
 * Active stream counts
 */
export function getRateLimitMetrics() {
  return {
    activeSseClients: sseConnectionsByIP.size,
    totalActiveSseStreams: Array.from(sseConnectionsByIP.values()).reduce((a, b) => a + b, 0),
  };
}
