import jwt, { type JwtPayload } from "jsonwebtoken";
import { z } from "zod";
import type { ID, Role } from "@vtt/shared";
import { InvalidTokenError } from "./errors.js";
import { RoleSchema } from "./validation.js";

/** The identity a session token resolves to. */
export interface Principal {
  userId: ID;
  role: Role;
}

export interface TokenServiceOptions {
  secret: string;
  ttlHours?: number;
  /** Milliseconds since the epoch; replaced in tests to move time. */
  clock?: () => number;
}

const ALGORITHM = "HS256";

const ClaimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  role: RoleSchema,
  iat: z.number().int(),
  exp: z.number().int(),
});

export class TokenService {
  private readonly secret: string;
  private readonly ttlHours: number;
  private readonly clock: () => number;

  constructor(options: TokenServiceOptions) {
    this.secret = options.secret;
    this.ttlHours = options.ttlHours ?? 24;
    this.clock = options.clock ?? Date.now;
  }

  issueToken(userId: ID, role: Role, ttlHours = this.ttlHours): string {
    const iat = Math.floor(this.clock() / 1000);
    const exp = iat + Math.round(ttlHours * 3600);
    return jwt.sign({ sub: String(userId), role, iat, exp }, this.secret, { algorithm: ALGORITHM });
  }

  /** Throws InvalidTokenError for malformed, expired or badly signed tokens. */
  validateToken(token: string): Principal {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: Math.floor(this.clock() / 1000),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new InvalidTokenError("Authentication token has expired");
      }
      throw new InvalidTokenError();
    }
    const claims = ClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new InvalidTokenError();
    }
    return { userId: Number(claims.data.sub), role: claims.data.role };
  }
}
