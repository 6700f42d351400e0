declare global {
  namespace Express {
    interface Request {
      /** Set by the authentication middleware once the caller is known. */
      userId?: string;
    }
  }
}

export {};
