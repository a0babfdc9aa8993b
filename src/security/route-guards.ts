import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError, formatErrorResponse } from '../utils/errors.js';

function getHeaderValue(header: string | string[] | undefined): string {
  if (Array.isArray(header)) {
    return header[0] ?? '';
  }
  return String(header ?? '');
}

export function extractBearerToken(authorizationHeader: string): string {
  if (!authorizationHeader) return '';
  const parts = authorizationHeader.trim().split(/\s+/);
  if (parts.length !== 2) return '';
  const [scheme, token] = parts;
  if (!scheme || !/^Bearer$/i.test(scheme)) return '';
  return (token ?? '').trim();
}

/**
 * An Authorization header is optional, but when present it must use the
 * Bearer scheme. The token itself is not checked.
 */
export function requireBearerSchemeIfPresent(request: FastifyRequest, reply: FastifyReply): boolean {
  const authHeader = getHeaderValue(request.headers.authorization);
  if (!authHeader) return true;
  if (extractBearerToken(authHeader)) return true;

  reply.code(401).send(formatErrorResponse(AppError.unauthorized('Authorization header must use the Bearer scheme')));
  return false;
}
