import type { MiddlewareHandler } from 'hono';
import { accessLogger } from './logger.js';

export interface AccessLogEntry {
  method: string;
  path: string;
  userAgent?: string;
  forwardedFor?: string;
  realIp?: string;
  status: number;
  contentLength?: string | null;
  durationMs: number;
}

/**
 * First address in X-Forwarded-For, then X-Real-IP, then "-".
 */
export function clientAddress(forwardedFor?: string, realIp?: string): string {
  const forwarded = forwardedFor?.split(',')[0]?.trim();
  return forwarded || realIp || '-';
}

/** `METHOD path "user-agent" client-ip status length duration` */
export function formatAccessLine(entry: AccessLogEntry): string {
  const client = clientAddress(entry.forwardedFor, entry.realIp);
  return `${entry.method} ${entry.path} "${entry.userAgent || '-'}" ${client} ${entry.status} ${entry.contentLength ?? '-'} ${entry.durationMs.toFixed(3)}ms`;
}

export function accessLog(): MiddlewareHandler {
  return async (c, next) => {
    const start = performance.now();
    await next();

    const url = new URL(c.req.url);
    accessLogger.info(
      formatAccessLine({
        method: c.req.method,
        path: `${url.pathname}${url.search}`,
        userAgent: c.req.header('user-agent'),
        forwardedFor: c.req.header('x-forwarded-for'),
        realIp: c.req.header('x-real-ip'),
        status: c.res.status,
        contentLength: c.res.headers.get('content-length'),
        durationMs: performance.now() - start
      })
    );
  };
}
