export const APP_NAME = "SplitLedger";

export const ROLE_VALUES = ["user", "admin"] as const;
export type UserRole = (typeof ROLE_VALUES)[number];

export const PAYMENT_STATUSES = ["unpaid", "pending_approval", "approved", "denied"] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const PAYMENT_ACTIONS = ["approve", "deny"] as const;
export type PaymentAction = (typeof PAYMENT_ACTIONS)[number];

export const TOKEN_TYPES = ["access", "refresh"] as const;
export type TokenType = (typeof TOKEN_TYPES)[number];

/** Currency precision applied to every split amount. */
export const MONEY_DECIMALS = 2;

export interface User {
  username: string;
  passwordHash: string;
  salt: string;
  roles: UserRole[];
  groups: string[];
  createdAt: string;
}

export interface Payment {
  paidAmount: number;
  status: PaymentStatus;
  updatedAt: string;
}

export interface Group {
  name: string;
  admin: string;
  budget: number;
  members: string[];
  splitAmount: number;
  payments: Record<string, Payment>;
  createdAt: string;
}

/**
 * Identity carried by a signed token. Times are Unix seconds, as they travel
 * in the `iat` and `exp` claims.
 */
export interface TokenClaims {
  subject: string;
  roles: UserRole[];
  groups: string[];
  issuedAt: number;
  expiresAt: number;
  tokenType: TokenType;
}

export interface AuditLog {
  id: string;
  actor: string;
  action: string;
  targetType: "user" | "group" | "payment";
  targetId: string;
  metadata?: Record<string, unknown>;
  timestamp: string;
  previousHash: string;
  entryHash: string;
}
