import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ForbiddenError, UnauthorizedError, sendError } from '../lib/errors';
import { TokenError, verifySessionToken, type Principal } from '../lib/sessionToken';
import type { Role } from '../models/user';

export type PrincipalHandler = (req: Request, res: Response, principal: Principal) => unknown;

export interface GateOptions {
  // role the principal must hold; any authenticated caller passes when omitted
  role?: Role;
}

/**
 * Bearer-token gate for protected routes. The token is verified once per
 * request and the resulting Principal is handed to the handler directly.
 */
export class AccessGate {
  constructor(
    private readonly jwtSecret: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Verifies an Authorization header value. Throws Unauthorized on any failure. */
  authenticate(header: string | undefined): Principal {
    if (!header) throw new UnauthorizedError();
    const [scheme, token, ...rest] = header.trim().split(/\s+/);
    if (scheme.toLowerCase() !== 'bearer' || !token || rest.length > 0) throw new UnauthorizedError();
    try {
      return verifySessionToken(token, this.jwtSecret, { now: this.now() });
    } catch (err) {
      if (err instanceof TokenError) throw new UnauthorizedError();
      throw err;
    }
  }

  // authentication always runs first, so a bad token never reaches the role check
  check(header: string | undefined, opts: GateOptions = {}): Principal {
    const principal = this.authenticate(header);
    if (opts.role && principal.role !== opts.role) throw new ForbiddenError();
    return principal;
  }

  protect(handler: PrincipalHandler, opts: GateOptions = {}): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction) => {
      let principal: Principal;
      try {
        principal = this.check(req.headers.authorization, opts);
      } catch (err) {
        return sendError(res, err, 'auth');
      }
      try {
        await handler(req, res, principal);
      } catch (err) {
        next(err);
      }
    };
  }
}
