import { Request, Response, NextFunction } from "express";

/**
 * Attaches `req.userId` when the request carries the shared bearer token.
 * Anything else passes through as anonymous; this never rejects.
 */
export function authenticate(expectedToken: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const match = /^Bearer (.+)$/.exec(req.header("authorization") ?? "");

    if (match && match[1] === expectedToken) {
      const userId = req.header("x-user-id");
      if (userId) {
        req.userId = userId;
      }
    }

    next();
  };
}
