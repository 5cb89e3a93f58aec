import type { FastifyReply, FastifyRequest } from 'fastify';

export interface TransportConfig {
  apiKeys: Set<string>;
  allowedOrigins: string[];
}

export type TransportCheck =
  | { allowed: true }
  | { allowed: false; status: number; code: string; reason: string };

function escapeRegExp(value: string): string {
  return value.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

/** `*` in an allow-list entry matches any run of characters */
export function originPattern(allowed: string): RegExp {
  return new RegExp('^' + allowed.split('*').map(escapeRegExp).join('.*') + '$');
}

export function isOriginAllowed(origin: string, allowedOrigins: string[]): boolean {
  return allowedOrigins.some(allowed => originPattern(allowed).test(origin));
}

export function checkTransport(config: TransportConfig, apiKey?: string, origin?: string): TransportCheck {
  // API Key validation
  if (!apiKey || !config.apiKeys.has(apiKey)) {
    return { allowed: false, status: 401, code: 'AUTH_FAILED', reason: 'Invalid or missing API key' };
  }

  // Origin validation
  if (origin && config.allowedOrigins.length > 0 && !isOriginAllowed(origin, config.allowedOrigins)) {
    return { allowed: false, status: 403, code: 'CORS_VIOLATION', reason: `Origin ${origin} not allowed` };
  }

  return { allowed: true };
}

export function bearerToken(header?: string): string | undefined {
  if (!header) return undefined;
  const match = /^Bearer\s+(.+)$/i.exec(header);
  return match ? match[1].trim() : undefined;
}

export function createAuthHook(config: TransportConfig) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const result = checkTransport(config, bearerToken(request.headers.authorization), request.headers.origin);
    if (!result.allowed) {
      // Returning the reply stops the route handler from running
      return reply.status(result.status).send({ error: result.code, message: result.reason });
    }
  };
}
