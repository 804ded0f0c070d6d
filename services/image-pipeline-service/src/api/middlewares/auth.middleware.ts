import { FastifyRequest } from 'fastify';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { Config } from '@config/index';
import { AppError, ErrorCode } from '@domain/errors';

const jwtPayloadSchema = z.object({
  sub: z.string().min(1),
  userId: z.string().min(1).optional(),
  email: z.string().optional(),
  permissions: z.array(z.string()).optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

export interface AuthenticatedUser {
  id: string;
  claims: JwtPayload;
}

declare module 'fastify' {
  interface FastifyRequest {
    user?: AuthenticatedUser;
  }
}

/**
 * Verifies a bearer token when one is sent. Requests without an
 * Authorization header pass through unauthenticated; a malformed, invalid or
 * expired token is rejected here.
 */
export function createAuthMiddleware(settings: Config['auth']) {
  return async function authMiddleware(request: FastifyRequest): Promise<void> {
    const authHeader = request.headers.authorization;
    if (!authHeader) return;

    const [scheme, token] = authHeader.split(' ');
    if (scheme !== 'Bearer' || !token) {
      throw new AppError(ErrorCode.INVALID_TOKEN, 'Invalid authorization format. Use: Bearer <token>');
    }

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, settings.jwtSecret, {
        issuer: settings.jwtIssuer,
        audience: settings.jwtAudience,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AppError(ErrorCode.EXPIRED_TOKEN, 'Token has expired');
      }
      throw new AppError(ErrorCode.INVALID_TOKEN, 'Invalid token');
    }

    const claims = jwtPayloadSchema.safeParse(decoded);
    if (!claims.success) {
      throw new AppError(ErrorCode.INVALID_TOKEN, 'Token is missing a subject');
    }

    request.user = { id: claims.data.userId ?? claims.data.sub, claims: claims.data };
  };
}

export function identityOf(request: FastifyRequest): { userId?: string; address: string } {
  return { userId: request.user?.id, address: request.ip };
}
