import type { FastifyReply } from 'fastify';

export interface ErrorBody {
  error: string;
  code: string;
  details?: unknown;
}

export function sendError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown,
): ErrorBody {
  reply.status(status);
  const payload: ErrorBody = { error: message, code };
  if (details !== undefined) payload.details = details;
  return payload;
}
