import jwt, { type JwtPayload } from "jsonwebtoken";
import { z } from "zod";
import { ROLE_VALUES, TOKEN_TYPES, type TokenClaims, type TokenType, type UserRole } from "@splitledger/shared";
import { ExpiredTokenError, InvalidTokenError, InvalidTokenTypeError } from "../utils/errors.js";
import { type Clock, daysToSeconds, minutesToSeconds, systemClock, toUnixSeconds } from "../utils/time.js";

export interface TokenServiceOptions {
  secret: string;
  algorithm: "HS256" | "HS384" | "HS512";
  accessTtlMinutes: number;
  refreshTtlDays: number;
}

/** The identity a token is minted for. */
export interface TokenSubject {
  subject: string;
  roles: UserRole[];
  groups: string[];
}

export interface IssuedToken {
  token: string;
  claims: TokenClaims;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  roles: z.array(z.enum(ROLE_VALUES)),
  groups: z.array(z.string()),
  token_type: z.enum(TOKEN_TYPES),
  iat: z.number().int(),
  exp: z.number().int(),
});

export class TokenService {
  constructor(
    private readonly options: TokenServiceOptions,
    private readonly clock: Clock = systemClock
  ) {}

  issueAccessToken(subject: TokenSubject): IssuedToken {
    return this.issue(subject, "access", minutesToSeconds(this.options.accessTtlMinutes));
  }

  issueRefreshToken(subject: TokenSubject): IssuedToken {
    return this.issue(subject, "refresh", daysToSeconds(this.options.refreshTtlDays));
  }

  verify(token: string): TokenClaims {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: [this.options.algorithm],
        clockTimestamp: toUnixSeconds(this.clock()),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new ExpiredTokenError();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new InvalidTokenError();
      }
      throw error;
    }

    const parsed = claimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new InvalidTokenError("Token is missing required claims.");
    }
    return {
      subject: parsed.data.sub,
      roles: parsed.data.roles,
      groups: parsed.data.groups,
      issuedAt: parsed.data.iat,
      expiresAt: parsed.data.exp,
      tokenType: parsed.data.token_type,
    };
  }

  /** Refresh tokens are not rotated; one stays usable until it expires. */
  refresh(refreshToken: string): IssuedToken {
    const claims = this.verify(refreshToken);
    if (claims.tokenType !== "refresh") {
      throw new InvalidTokenTypeError("refresh");
    }
    return this.issueAccessToken({
      subject: claims.subject,
      roles: claims.roles,
      groups: claims.groups,
    });
  }

  private issue(subject: TokenSubject, tokenType: TokenType, ttlSeconds: number): IssuedToken {
    const issuedAt = toUnixSeconds(this.clock());
    const token = jwt.sign(
      {
        sub: subject.subject,
        roles: subject.roles,
        groups: subject.groups,
        token_type: tokenType,
        iat: issuedAt,
      },
      this.options.secret,
      { algorithm: this.options.algorithm, expiresIn: ttlSeconds }
    );
    return {
      token,
      claims: {
        subject: subject.subject,
        roles: [...subject.roles],
        groups: [...subject.groups],
        issuedAt,
        expiresAt: issuedAt + ttlSeconds,
        tokenType,
      },
    };
  }
}
