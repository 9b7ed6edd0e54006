import type { TokenClaims, UserRole } from "@splitledger/shared";
import { ForbiddenError, InvalidTokenTypeError } from "../utils/errors.js";
import type { TokenService } from "./tokens.js";

/** Stateless gate placed in front of every protected operation. */
export class AccessGate {
  constructor(private readonly tokens: TokenService) {}

  /** Verifier failures pass through untouched; refresh tokens are turned away. */
  authenticateRequest(token: string): TokenClaims {
    const claims = this.tokens.verify(token);
    if (claims.tokenType !== "access") {
      throw new InvalidTokenTypeError("access");
    }
    return claims;
  }

  requireRoles(claims: TokenClaims, required: readonly UserRole[]): TokenClaims {
    if (!claims.roles.some((role) => required.includes(role))) {
      throw new ForbiddenError("Forbidden: insufficient role.");
    }
    return claims;
  }
}
