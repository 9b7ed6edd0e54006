import type { AuditLog } from "@splitledger/shared";
import { type AuditEntryInput, type SettlementStore, auditHash } from "./store.js";

export interface AuditQuery {
  action?: string;
  limit?: number;
}

export class AuditTrail {
  constructor(private readonly store: SettlementStore) {}

  record(
    actor: string,
    action: string,
    targetType: AuditEntryInput["targetType"],
    targetId: string,
    metadata: Record<string, unknown> = {}
  ): AuditLog {
    return this.store.appendAudit({ actor, action, targetType, targetId, metadata });
  }

  /** Newest first. */
  list(query: AuditQuery = {}): AuditLog[] {
    const entries = this.store
      .listAudit()
      .filter((entry) => !query.action || entry.action === query.action)
      .reverse();
    return query.limit === undefined ? entries : entries.slice(0, query.limit);
  }

  verify(): { valid: boolean; entries: number; brokenAt?: string } {
    const entries = this.store.listAudit();
    let previousHash = "GENESIS";
    for (const entry of entries) {
      const expected = auditHash(previousHash, entry.timestamp, entry);
      if (entry.previousHash !== previousHash || entry.entryHash !== expected) {
        return { valid: false, entries: entries.length, brokenAt: entry.id };
      }
      previousHash = entry.entryHash;
    }
    return { valid: true, entries: entries.length };
  }
}
