import { Injectable, NestMiddleware } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { v4 as uuidv4 } from 'uuid';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

export type CorrelatedRequest = FastifyRequest['raw'] & { correlationId?: string };

export function resolveCorrelationId(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim() ? value.trim() : uuidv4();
}

@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: CorrelatedRequest, res: FastifyReply['raw'], next: () => void) {
    const correlationId = resolveCorrelationId(req.headers[CORRELATION_ID_HEADER]);

    // Add to request for downstream use
    req.correlationId = correlationId;

    // Add to response headers
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    next();
  }
}
