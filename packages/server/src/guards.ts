import type { IncomingHttpHeaders } from "node:http";
import { AuthError, ForbiddenError } from "./errors.js";
import type { Principal, TokenService } from "./tokens.js";

export function bearerToken(headers: IncomingHttpHeaders): string | null {
  const header = headers.authorization;
  if (!header) return null;
  const [scheme, token] = header.split(" ");
  if (scheme !== "Bearer" || !token) return null;
  return token;
}

/** Resolves the request's bearer token once into the caller's principal. */
export function authenticateRequest(headers: IncomingHttpHeaders, tokens: TokenService): Principal {
  const token = bearerToken(headers);
  if (!token) {
    throw new AuthError();
  }
  return tokens.validateToken(token);
}

export function isGm(principal: Principal | null): boolean {
  return principal?.role === "gm";
}

export function requireGm(principal: Principal): Principal {
  if (!isGm(principal)) {
    throw new ForbiddenError();
  }
  return principal;
}
