import jwt from "jsonwebtoken";
import { beforeEach, describe, expect, it } from "vitest";
import type { Services } from "../src/domain/index.js";
import { TokenService } from "../src/domain/tokens.js";
import { ExpiredTokenError, InvalidTokenError, InvalidTokenTypeError } from "../src/utils/errors.js";
import { toUnixSeconds } from "../src/utils/time.js";
import { TEST_SECRET, type ManualClock, manualClock, testServices } from "./helpers.js";

const subject = { subject: "alice", roles: ["user" as const], groups: ["trip"] };

describe("token service", () => {
  let time: ManualClock;
  let services: Services;

  beforeEach(() => {
    time = manualClock();
    services = testServices(time.clock);
  });

  it("returns the issued claims while an access token is fresh", () => {
    const issued = services.tokens.issueAccessToken(subject);
    time.advanceSeconds(29 * 60);

    const claims = services.tokens.verify(issued.token);
    expect(claims).toEqual(issued.claims);
    expect(claims).toEqual({
      subject: "alice",
      roles: ["user"],
      groups: ["trip"],
      issuedAt: toUnixSeconds(new Date("2026-01-01T00:00:00.000Z")),
      expiresAt: toUnixSeconds(new Date("2026-01-01T00:30:00.000Z")),
      tokenType: "access",
    });
  });

  it("rejects an access token once it expires", () => {
    const issued = services.tokens.issueAccessToken(subject);
    time.advanceSeconds(30 * 60);

    expect(() => services.tokens.verify(issued.token)).toThrow(ExpiredTokenError);
  });

  it("gives refresh tokens a seven day lifetime", () => {
    const issued = services.tokens.issueRefreshToken(subject);
    expect(issued.claims.expiresAt - issued.claims.issuedAt).toBe(7 * 86_400);

    time.advanceSeconds(7 * 86_400 - 1);
    expect(services.tokens.verify(issued.token).tokenType).toBe("refresh");

    time.advanceSeconds(1);
    expect(() => services.tokens.refresh(issued.token)).toThrow(ExpiredTokenError);
  });

  it("rejects tokens signed with another secret or algorithm", () => {
    const foreign = new TokenService(
      { secret: "another-test-secret", algorithm: "HS256", accessTtlMinutes: 30, refreshTtlDays: 7 },
      time.clock
    );
    const otherAlgorithm = new TokenService(
      { secret: TEST_SECRET, algorithm: "HS512", accessTtlMinutes: 30, refreshTtlDays: 7 },
      time.clock
    );

    expect(() => services.tokens.verify(foreign.issueAccessToken(subject).token)).toThrow(InvalidTokenError);
    expect(() => services.tokens.verify(otherAlgorithm.issueAccessToken(subject).token)).toThrow(
      InvalidTokenError
    );
    expect(() => services.tokens.verify("not-a-token")).toThrow(InvalidTokenError);
  });

  it("rejects a signed token that lacks required claims", () => {
    const token = jwt.sign(
      { sub: "alice", token_type: "access", iat: toUnixSeconds(time.clock()) },
      TEST_SECRET,
      { algorithm: "HS256", expiresIn: 60 }
    );

    expect(() => services.tokens.verify(token)).toThrow("Token is missing required claims.");
  });

  it("exchanges a refresh token for an access token with the same identity", () => {
    const refreshToken = services.tokens.issueRefreshToken(subject).token;
    time.advanceSeconds(3 * 86_400);

    const renewed = services.tokens.refresh(refreshToken);
    expect(renewed.claims.tokenType).toBe("access");
    expect(renewed.claims.subject).toBe("alice");
    expect(renewed.claims.roles).toEqual(["user"]);
    expect(renewed.claims.groups).toEqual(["trip"]);
    expect(services.gate.authenticateRequest(renewed.token).subject).toBe("alice");
  });

  it("keeps access and refresh tokens apart", () => {
    const access = services.tokens.issueAccessToken(subject).token;
    const refresh = services.tokens.issueRefreshToken(subject).token;

    expect(() => services.tokens.refresh(access)).toThrow(InvalidTokenTypeError);
    expect(() => services.gate.authenticateRequest(refresh)).toThrow(InvalidTokenTypeError);
  });
});
