import { beforeEach, describe, expect, it } from "vitest";
import type { Services } from "../src/domain/index.js";
import { splitFor } from "../src/domain/ledger.js";
import {
  ConflictError,
  ForbiddenError,
  InvalidBudgetError,
  NotFoundError,
} from "../src/utils/errors.js";
import { registerUsers, testServices } from "./helpers.js";

describe("group ledger", () => {
  let services: Services;

  beforeEach(() => {
    services = testServices();
    registerUsers(services, ["alice", "bob", "carol", "dave"]);
  });

  it("creates a group with the admin as its only member", () => {
    const group = services.ledger.createGroup({
      name: "trip",
      admin: "alice",
      budget: 300,
      includeAdminAsMember: true,
    });

    expect(group.members).toEqual(["alice"]);
    expect(group.splitAmount).toBe(300);
    expect(group.payments).toEqual({ alice: expect.objectContaining({ paidAmount: 0, status: "unpaid" }) });
    expect(services.credentials.get("alice").groups).toEqual(["trip"]);
  });

  it("keeps the whole budget as the split of an empty group until someone joins", () => {
    const group = services.ledger.createGroup({
      name: "gift",
      admin: "alice",
      budget: 90,
      includeAdminAsMember: false,
    });
    expect(group.members).toEqual([]);
    expect(group.splitAmount).toBe(90);

    const { group: updated } = services.ledger.addMember("gift", "bob");
    expect(updated.members).toEqual(["bob"]);
    expect(updated.splitAmount).toBe(90);
    expect(Object.keys(updated.payments)).toEqual(["bob"]);

    expect(services.ledger.addMember("gift", "carol").group.splitAmount).toBe(45);
  });

  it("rejects non-positive budgets", () => {
    for (const budget of [0, -10, Number.NaN]) {
      expect(() =>
        services.ledger.createGroup({ name: "trip", admin: "alice", budget, includeAdminAsMember: true })
      ).toThrow(InvalidBudgetError);
    }
    expect(services.ledger.listGroups()).toEqual([]);
  });

  it("rejects duplicate group names", () => {
    services.ledger.createGroup({ name: "trip", admin: "alice", budget: 300, includeAdminAsMember: true });

    expect(() =>
      services.ledger.createGroup({ name: "trip", admin: "bob", budget: 100, includeAdminAsMember: true })
    ).toThrow(ConflictError);
  });

  it("recomputes the split for every member when someone joins", () => {
    services.ledger.createGroup({ name: "trip", admin: "alice", budget: 300, includeAdminAsMember: true });

    const result = services.ledger.addMember("trip", "bob");
    expect(result.added).toBe(true);
    expect(result.group.splitAmount).toBe(150);
    expect(result.group.payments).toEqual({
      alice: expect.objectContaining({ paidAmount: 0, status: "unpaid" }),
      bob: expect.objectContaining({ paidAmount: 0, status: "unpaid" }),
    });
    expect(services.credentials.get("bob").groups).toEqual(["trip"]);
  });

  it("treats adding an existing member as a no-op", () => {
    services.ledger.createGroup({ name: "trip", admin: "alice", budget: 300, includeAdminAsMember: true });
    services.ledger.addMember("trip", "bob");

    const again = services.ledger.addMember("trip", "bob");
    expect(again.added).toBe(false);
    expect(again.group.members).toEqual(["alice", "bob"]);
    expect(again.group.splitAmount).toBe(150);
    expect(services.audit.list({ action: "ADD_MEMBER" })).toHaveLength(1);
  });

  it("rounds the split to cents", () => {
    services.ledger.createGroup({ name: "dinner", admin: "alice", budget: 100, includeAdminAsMember: true });
    services.ledger.addMember("dinner", "bob");

    expect(services.ledger.addMember("dinner", "carol").group.splitAmount).toBe(33.33);
  });

  it("keeps split times members within rounding of the budget", () => {
    const budgets = [10, 99.99, 100, 250.5, 1000, 1234.56];
    const users = ["alice", "bob", "carol", "dave"];
    for (const budget of budgets) {
      const name = `pool-${budget}`;
      services.ledger.createGroup({ name, admin: "alice", budget, includeAdminAsMember: true });
      for (const user of users.slice(1)) {
        const { group } = services.ledger.addMember(name, user);
        expect(Math.abs(group.splitAmount * group.members.length - budget)).toBeLessThanOrEqual(
          0.005 * group.members.length + 1e-9
        );
        expect(Object.keys(group.payments).sort()).toEqual([...group.members].sort());
      }
    }
  });

  it("reports unknown users and groups as not found", () => {
    services.ledger.createGroup({ name: "trip", admin: "alice", budget: 300, includeAdminAsMember: true });

    expect(() => services.ledger.addMember("ghost", "bob")).toThrow(NotFoundError);
    expect(() => services.ledger.addMember("trip", "nobody")).toThrow(NotFoundError);
    expect(services.ledger.requireGroup("trip").members).toEqual(["alice"]);
  });

  it("shows group status to members only", () => {
    services.ledger.createGroup({ name: "trip", admin: "alice", budget: 300, includeAdminAsMember: true });
    services.ledger.addMember("trip", "bob");

    expect(services.ledger.getStatus("trip", "bob").payments.alice.status).toBe("unpaid");
    expect(() => services.ledger.getStatus("trip", "carol")).toThrow(ForbiddenError);
    expect(() => services.ledger.getStatus("ghost", "bob")).toThrow(NotFoundError);
  });

  it("hands out copies that cannot change stored groups", () => {
    const group = services.ledger.createGroup({
      name: "trip",
      admin: "alice",
      budget: 300,
      includeAdminAsMember: true,
    });
    group.members.push("mallory");
    services.ledger.listGroups()[0].splitAmount = 1;

    const stored = services.ledger.requireGroup("trip");
    expect(stored.members).toEqual(["alice"]);
    expect(stored.splitAmount).toBe(300);
  });

  it("splits evenly with a floor of one member", () => {
    expect(splitFor(300, 0)).toBe(300);
    expect(splitFor(300, 2)).toBe(150);
    expect(splitFor(10, 3)).toBe(3.33);
  });
});
