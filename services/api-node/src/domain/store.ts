import type { AuditLog, Group, User } from "@splitledger/shared";
import { hashValue, uid } from "../utils/crypto.js";
import { type Clock, nowIso, systemClock } from "../utils/time.js";

export type AuditEntryInput = Pick<AuditLog, "actor" | "action" | "targetType" | "targetId" | "metadata">;

/**
 * Backing store shared by every settlement component.
 *
 * Mutations go through `insert*` and `updateGroup`, each of which completes
 * its read-modify-write without yielding, so writes to one group never
 * interleave. An async implementation must keep that guarantee per group name.
 */
export interface SettlementStore {
  findUser(username: string): User | undefined;
  listUsers(): User[];
  insertUser(user: User): void;
  updateUser<T>(username: string, mutate: (user: User) => T): T;

  findGroup(name: string): Group | undefined;
  listGroups(): Group[];
  insertGroup(group: Group): void;
  updateGroup<T>(name: string, mutate: (group: Group) => T): T;

  appendAudit(entry: AuditEntryInput): AuditLog;
  listAudit(): AuditLog[];

  reset(): void;
}

export class InMemoryStore implements SettlementStore {
  private users = new Map<string, User>();
  private groups = new Map<string, Group>();
  private auditLogs: AuditLog[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  findUser(username: string): User | undefined {
    const user = this.users.get(username);
    return user ? clone(user) : undefined;
  }

  listUsers(): User[] {
    return [...this.users.values()].map(clone);
  }

  insertUser(user: User): void {
    if (this.users.has(user.username)) {
      throw new Error(`User ${user.username} already stored.`);
    }
    this.users.set(user.username, clone(user));
  }

  updateUser<T>(username: string, mutate: (user: User) => T): T {
    const current = this.users.get(username);
    if (!current) {
      throw new Error(`User ${username} is not stored.`);
    }
    const draft = clone(current);
    const result = mutate(draft);
    this.users.set(username, draft);
    return result;
  }

  findGroup(name: string): Group | undefined {
    const group = this.groups.get(name);
    return group ? clone(group) : undefined;
  }

  listGroups(): Group[] {
    return [...this.groups.values()].map(clone);
  }

  insertGroup(group: Group): void {
    if (this.groups.has(group.name)) {
      throw new Error(`Group ${group.name} already stored.`);
    }
    this.groups.set(group.name, clone(group));
  }

  updateGroup<T>(name: string, mutate: (group: Group) => T): T {
    const current = this.groups.get(name);
    if (!current) {
      throw new Error(`Group ${name} is not stored.`);
    }
    // The draft only replaces the stored record when the mutator returns,
    // so a mutator that throws leaves the group untouched.
    const draft = clone(current);
    const result = mutate(draft);
    this.groups.set(name, draft);
    return result;
  }

  appendAudit(entry: AuditEntryInput): AuditLog {
    const previousHash = this.auditLogs.at(-1)?.entryHash ?? "GENESIS";
    const timestamp = nowIso(this.clock);
    const log: AuditLog = {
      id: uid("audit"),
      ...entry,
      timestamp,
      previousHash,
      entryHash: auditHash(previousHash, timestamp, entry),
    };
    this.auditLogs.push(log);
    return clone(log);
  }

  listAudit(): AuditLog[] {
    return this.auditLogs.map(clone);
  }

  reset(): void {
    this.users.clear();
    this.groups.clear();
    this.auditLogs = [];
  }
}

export function auditHash(previousHash: string, timestamp: string, entry: AuditEntryInput): string {
  return hashValue(
    `${previousHash}|${timestamp}|${entry.actor}|${entry.action}|${entry.targetType}|${entry.targetId}|${JSON.stringify(entry.metadata ?? {})}`
  );
}

function clone<T>(value: T): T {
  return structuredClone(value);
}
