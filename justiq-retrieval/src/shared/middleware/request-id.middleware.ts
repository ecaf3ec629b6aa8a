import { Injectable, NestMiddleware } from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Caller-supplied request ID, or a fresh UUID
 */
export function resolveRequestId(headers: IncomingHttpHeaders): string {
  const existing = headers[REQUEST_ID_HEADER];
  return typeof existing === 'string' && existing.length > 0
    ? existing
    : uuidv4();
}

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const requestId = resolveRequestId(req.headers);
    req.headers[REQUEST_ID_HEADER] = requestId;
    res.setHeader('X-Request-ID', requestId);
    next();
  }
}
