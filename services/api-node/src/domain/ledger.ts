import type { Group, Payment } from "@splitledger/shared";
import {
  ConflictError,
  ForbiddenError,
  InvalidBudgetError,
  NotFoundError,
  ValidationError,
  assert,
} from "../utils/errors.js";
import { roundMoney } from "../utils/money.js";
import { type Clock, nowIso, systemClock } from "../utils/time.js";
import type { AuditTrail } from "./audit.js";
import type { SettlementStore } from "./store.js";

export interface CreateGroupInput {
  name: string;
  admin: string;
  budget: number;
  includeAdminAsMember: boolean;
}

export interface AddMemberResult {
  group: Group;
  added: boolean;
}

/** Owns group records and keeps every member's split consistent with the budget. */
export class GroupLedger {
  constructor(
    private readonly store: SettlementStore,
    private readonly audit: AuditTrail,
    private readonly clock: Clock = systemClock
  ) {}

  createGroup(input: CreateGroupInput): Group {
    const name = input.name.trim();
    assert(name.length > 0, () => new ValidationError("Group name is required."));
    assert(Number.isFinite(input.budget) && input.budget > 0, () => new InvalidBudgetError());
    assert(
      !this.store.findGroup(name),
      () => new ConflictError("GROUP_EXISTS", "Group already exists.", 400)
    );
    assert(this.store.findUser(input.admin), () => new NotFoundError("User not found."));

    const members = input.includeAdminAsMember ? [input.admin] : [];
    const group: Group = {
      name,
      admin: input.admin,
      budget: input.budget,
      members,
      splitAmount: splitFor(input.budget, members.length),
      payments: {},
      createdAt: nowIso(this.clock),
    };
    for (const member of members) {
      setPayment(group, member, this.newPayment());
    }

    this.store.insertGroup(group);
    for (const member of members) {
      this.linkUser(member, name);
    }
    this.audit.record(input.admin, "CREATE_GROUP", "group", name, {
      budget: group.budget,
      members: members.length,
    });
    return group;
  }

  addMember(groupName: string, username: string, actor = username): AddMemberResult {
    assert(this.store.findGroup(groupName), () => new NotFoundError("Group not found."));
    assert(this.store.findUser(username), () => new NotFoundError("User not found."));

    const result = this.store.updateGroup(groupName, (group) => {
      if (group.members.includes(username)) {
        return { group, added: false };
      }
      group.members.push(username);
      setPayment(group, username, this.newPayment());
      group.splitAmount = splitFor(group.budget, group.members.length);
      return { group, added: true };
    });

    if (result.added) {
      this.linkUser(username, groupName);
      this.audit.record(actor, "ADD_MEMBER", "group", groupName, {
        username,
        splitAmount: result.group.splitAmount,
      });
    }
    return result;
  }

  /** Members see the whole group, including each other's payments. */
  getStatus(groupName: string, requester: string): Group {
    const group = this.requireGroup(groupName);
    assert(
      group.members.includes(requester),
      () => new ForbiddenError("You are not part of this group.", "NOT_GROUP_MEMBER")
    );
    return group;
  }

  listGroups(): Group[] {
    return this.store.listGroups();
  }

  requireGroup(groupName: string): Group {
    const group = this.store.findGroup(groupName);
    assert(group, () => new NotFoundError("Group not found."));
    return group;
  }

  private linkUser(username: string, groupName: string): void {
    this.store.updateUser(username, (user) => {
      if (!user.groups.includes(groupName)) {
        user.groups.push(groupName);
      }
    });
  }

  private newPayment(): Payment {
    return { paidAmount: 0, status: "unpaid", updatedAt: nowIso(this.clock) };
  }
}

/** An empty group carries the whole budget as its split until someone joins. */
export function splitFor(budget: number, memberCount: number): number {
  return roundMoney(budget / Math.max(1, memberCount));
}

/** Own records only; usernames such as `constructor` must not resolve to inherited members. */
export function paymentOf(group: Group, username: string): Payment | undefined {
  return Object.hasOwn(group.payments, username) ? group.payments[username] : undefined;
}

export function setPayment(group: Group, username: string, payment: Payment): void {
  Object.defineProperty(group.payments, username, {
    value: payment,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
