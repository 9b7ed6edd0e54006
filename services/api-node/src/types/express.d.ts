import type { TokenClaims } from "@splitledger/shared";

declare global {
  namespace Express {
    interface Request {
      authClaims?: TokenClaims;
      bearerToken?: string;
    }
  }
}

export {};
