import { Request, Response, NextFunction, RequestHandler } from 'express';
import * as jwt from 'jsonwebtoken';
import { sendAuthError } from '../errors/validationErrors';
import { throwApiError } from '../errors/apiError';
import { validateOwnerId } from '../../engine/validation/validators';

declare global {
  namespace Express {
    interface Request {
      /** Subject of the verified bearer token; the owner id of every record it touches. */
      ownerId?: string;
    }
  }
}

/**
 * Bearer JWT (HS256) authentication. The `sub` claim is the owner id and must
 * itself be a valid owner id.
 */
export function createAuthenticator(secret: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      sendAuthError(res, 'Missing or malformed authorization header');
      return;
    }

    const token = authHeader.substring(7).trim();
    if (token === '') {
      sendAuthError(res, 'Empty authorization token');
      return;
    }

    if (!secret) {
      console.error('[AUTH_CONFIG_ERROR] AUTH_JWT_SECRET not configured');
      res.status(500).json({ errorCode: 'SERVER_ERROR' });
      return;
    }

    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, secret, { algorithms: ['HS256'] });
    } catch (error) {
      const message =
        error instanceof jwt.TokenExpiredError
          ? 'Token has expired'
          : error instanceof jwt.JsonWebTokenError
            ? 'Invalid token signature'
            : 'Token verification failed';
      sendAuthError(res, message);
      return;
    }

    if (typeof payload === 'string' || !payload.sub) {
      sendAuthError(res, 'Invalid token: missing subject claim');
      return;
    }

    const owner = validateOwnerId(payload.sub);
    if (!owner.ok) {
      sendAuthError(res, `Invalid token: ${owner.rejection.message}`);
      return;
    }

    req.ownerId = owner.value;
    next();
  };
}

/**
 * Owner id of an authenticated request. Routes mounted behind the
 * authenticator always have one.
 */
export function requireOwner(req: Request): string {
  if (!req.ownerId) {
    return throwApiError('UNAUTHORIZED', 401, 'Request is not authenticated');
  }
  return req.ownerId;
}
