import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import { RequestContextService } from '../services/request-context.service';

export const CORRELATION_HEADER = 'x-correlation-id';

export const readCorrelationId = (req: Request): string | undefined => {
  const raw = req.headers[CORRELATION_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value && value.length <= 128 ? value : undefined;
};

/**
 * Opens the per-request context and echoes the correlation id before guards
 * run, so rejected requests carry the header too.
 */
@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  constructor(private readonly requestContext: RequestContextService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const correlationId = readCorrelationId(req) ?? randomUUID();
    res.setHeader('X-Correlation-Id', correlationId);
    this.requestContext.runWith({ correlationId }, next);
  }
}
