import crypto from "node:crypto";

const PASSWORD_KEY_LENGTH = 64;

export function uid(prefix: string): string {
  return `${prefix}_${crypto.randomBytes(6).toString("hex")}_${Date.now().toString(36)}`;
}

export function newSalt(): string {
  return crypto.randomBytes(16).toString("hex");
}

export function hashValue(value: string): string {
  const hash = crypto.createHash("sha256");
  hash.update(value);
  return hash.digest("hex");
}

export function hashPassword(password: string, salt: string): string {
  return crypto.scryptSync(password, salt, PASSWORD_KEY_LENGTH).toString("hex");
}

export function verifyPassword(password: string, salt: string, expectedHash: string): boolean {
  const actual = Buffer.from(hashPassword(password, salt), "hex");
  const expected = Buffer.from(expectedHash, "hex");
  return actual.length === expected.length && crypto.timingSafeEqual(actual, expected);
}
