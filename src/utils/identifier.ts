import { Request } from "express";

export type ClientKind = "user" | "ip";

/**
 * Determines the identifier a request is counted under.
 *
 * Priority:
 * 1. Authenticated user ID (req.userId)
 * 2. Client address (fallback)
 *
 * Users and anonymous addresses live in separate namespaces, so a user
 * keeps one quota across networks.
 */
export function getRateLimitKey(req: Request, prefix: string): string {
  if (req.userId) {
    return clientKey(prefix, "user", req.userId);
  }

  const address = req.ip ?? req.socket.remoteAddress ?? "unknown";
  return clientKey(prefix, "ip", address);
}

export function clientKey(
  prefix: string,
  kind: ClientKind,
  identity: string
): string {
  return `${prefix}${kind}:${identity}`;
}
