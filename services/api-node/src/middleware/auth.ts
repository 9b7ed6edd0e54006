import type { NextFunction, Request, Response } from "express";
import type { TokenClaims, UserRole } from "@splitledger/shared";
import { services } from "../domain/index.js";
import { UnauthorizedError } from "../utils/errors.js";

export function bearerToken(request: Request): string {
  const header = request.headers.authorization;
  const token = header?.startsWith("Bearer ") ? header.slice("Bearer ".length).trim() : "";
  if (!token) {
    throw new UnauthorizedError("Missing Bearer token.");
  }
  return token;
}

export function requireAuth(request: Request, _response: Response, next: NextFunction): void {
  try {
    const token = bearerToken(request);
    request.authClaims = services.gate.authenticateRequest(token);
    request.bearerToken = token;
    next();
  } catch (error) {
    next(error);
  }
}

export function requireRole(roles: UserRole[]) {
  return (request: Request, _response: Response, next: NextFunction): void => {
    try {
      services.gate.requireRoles(authClaims(request), roles);
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function authClaims(request: Request): TokenClaims {
  if (!request.authClaims) {
    throw new UnauthorizedError("Authentication required.");
  }
  return request.authClaims;
}
