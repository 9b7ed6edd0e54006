export class HttpError extends Error {
  status: number;
  code: string;
  details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/** Duplicate resource, or a write against a record that no longer accepts it. */
export class ConflictError extends HttpError {
  constructor(code: string, message: string, status = 409) {
    super(status, code, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, "NOT_FOUND", message);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message: string, code = "FORBIDDEN") {
    super(403, code, message);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message: string, code = "UNAUTHORIZED") {
    super(401, code, message);
  }
}

export class ExpiredTokenError extends UnauthorizedError {
  constructor() {
    super("Token expired.", "TOKEN_EXPIRED");
  }
}

export class InvalidTokenError extends UnauthorizedError {
  constructor(message = "Invalid token.") {
    super(message, "INVALID_TOKEN");
  }
}

export class InvalidTokenTypeError extends UnauthorizedError {
  constructor(expected: string) {
    super(`Expected a ${expected} token.`, "INVALID_TOKEN_TYPE");
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, code = "VALIDATION_ERROR", details?: unknown) {
    super(400, code, message, details);
  }
}

export class InvalidBudgetError extends ValidationError {
  constructor() {
    super("Budget must be greater than zero.", "INVALID_BUDGET");
  }
}

export class ExceedsShareError extends ValidationError {
  constructor(amount: number, splitAmount: number) {
    super(`Amount ${amount} exceeds threshold amount ${splitAmount}.`, "EXCEEDS_SHARE");
  }
}

export class ShortPaymentError extends ValidationError {
  constructor(paidAmount: number, splitAmount: number) {
    super(
      `Paid amount ${paidAmount} does not match split amount ${splitAmount}.`,
      "PAYMENT_AMOUNT_MISMATCH"
    );
  }
}

export class PaymentSettledError extends ConflictError {
  constructor(username: string) {
    super("PAYMENT_SETTLED", `Payment for ${username} is already approved.`);
  }
}

export class PaymentNotPendingError extends ConflictError {
  constructor(username: string, status: string) {
    super("PAYMENT_NOT_PENDING", `Payment for ${username} is ${status}, not pending approval.`);
  }
}

export function assert(condition: unknown, error: () => HttpError): asserts condition {
  if (!condition) {
    throw error();
  }
}
