/**
 * Admin Authentication Hook
 *
 * Fastify preHandler hook that guards admin routes with the X-API-Key header.
 * All other routes are public (the call webhook is called by the telephony
 * platform without credentials).
 */

import { timingSafeEqual } from 'crypto';
import { FastifyRequest, FastifyReply } from 'fastify';
import { ADMIN_PREFIXES } from '../../config/auth';

function isAdminRoute(url: string): boolean {
  return ADMIN_PREFIXES.some((prefix) => url.startsWith(prefix));
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Build the hook for a given admin key. An empty key leaves admin routes open.
 */
export function createAdminAuthHook(adminApiKey: string) {
  return async function adminAuthHook(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | void> {
    const path = request.url.split('?')[0];

    if (!adminApiKey || !isAdminRoute(path)) return;

    const header = request.headers['x-api-key'];
    const apiKey = Array.isArray(header) ? header[0] : header;

    if (!apiKey) {
      return reply.status(401).send({ error: 'Missing API key. Provide X-API-Key header.' });
    }

    if (!keysMatch(apiKey, adminApiKey)) {
      return reply.status(401).send({ error: 'Invalid API key.' });
    }
  };
}
