import type { FastifyReply, FastifyRequest } from 'fastify';

export type ErrorResponseType = 'not_found' | 'not_ready';

export function errorResponse(
  reply: FastifyReply,
  type: ErrorResponseType,
  extras: Record<string, unknown> = {},
): FastifyReply {
  if (type === 'not_ready') {
    return reply.code(409).send({ error: 'not_ready', ...extras });
  }

  return reply.code(404).send({ error: 'not_found' });
}

export const resolveRoutePath = (request: FastifyRequest, fallback: string): string => {
  return request.routeOptions?.url ?? request.url ?? fallback;
};

/** Quote-safe `Content-Disposition` value for a download. */
export function attachmentDisposition(fileName: string): string {
  const asciiName = fileName.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_');
  return `attachment; filename="${asciiName}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}
