import request from "supertest";
import type { Express } from "express";
import { expect } from "vitest";
import type { UserRole } from "@splitledger/shared";
import { createServices, type Services } from "../src/domain/index.js";
import type { Clock } from "../src/utils/time.js";

export const TEST_SECRET = "test-secret-value-123";
export const TEST_PASSWORD = "password-123";

export interface ManualClock {
  clock: Clock;
  advanceSeconds(seconds: number): void;
}

export function manualClock(start = "2026-01-01T00:00:00.000Z"): ManualClock {
  let current = new Date(start).getTime();
  return {
    clock: () => new Date(current),
    advanceSeconds(seconds: number) {
      current += seconds * 1000;
    },
  };
}

export function testServices(clock?: Clock): Services {
  return createServices({
    clock,
    tokens: { secret: TEST_SECRET, algorithm: "HS256", accessTtlMinutes: 30, refreshTtlDays: 7 },
    passwordMinLength: 8,
  });
}

export function registerUsers(services: Services, usernames: string[], role: UserRole = "user"): void {
  for (const username of usernames) {
    services.credentials.register({ username, password: TEST_PASSWORD, role, groups: [] });
  }
}

export async function registerAndLogin(
  app: Express,
  username: string,
  role: UserRole = "user"
): Promise<{ accessToken: string; refreshToken: string }> {
  const register = await request(app)
    .post("/v1/register")
    .type("form")
    .send({ username, password: TEST_PASSWORD, role });
  expect(register.status).toBe(201);
  const login = await request(app)
    .post("/v1/login")
    .type("form")
    .send({ username, password: TEST_PASSWORD });
  expect(login.status).toBe(200);
  return {
    accessToken: login.body.data.access_token as string,
    refreshToken: login.body.data.refresh_token as string,
  };
}
