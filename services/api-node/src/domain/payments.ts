import { PAYMENT_ACTIONS, type Payment, type PaymentAction } from "@splitledger/shared";
import {
  ExceedsShareError,
  ForbiddenError,
  NotFoundError,
  PaymentNotPendingError,
  PaymentSettledError,
  ShortPaymentError,
  ValidationError,
  assert,
} from "../utils/errors.js";
import { type Clock, nowIso, systemClock } from "../utils/time.js";
import type { AuditTrail } from "./audit.js";
import { type GroupLedger, paymentOf } from "./ledger.js";
import type { SettlementStore } from "./store.js";

export interface PaymentRecord extends Payment {
  groupName: string;
  username: string;
  splitAmount: number;
}

/**
 * unpaid -> pending_approval -> approved | denied, with denied members free
 * to resubmit before the admin can approve. Approved is final for the member.
 */
export class PaymentWorkflow {
  constructor(
    private readonly store: SettlementStore,
    private readonly ledger: GroupLedger,
    private readonly audit: AuditTrail,
    private readonly clock: Clock = systemClock
  ) {}

  submitPayment(groupName: string, member: string, amount: number): PaymentRecord {
    assert(Number.isFinite(amount) && amount > 0, () => new ValidationError("Amount must be greater than zero."));
    const current = this.store.findGroup(groupName);
    assert(
      current && current.members.includes(member),
      () => new ForbiddenError("Not part of this group.", "NOT_GROUP_MEMBER")
    );

    const record = this.store.updateGroup(groupName, (group) => {
      const payment = paymentOf(group, member);
      assert(payment, () => new NotFoundError("Payment record not found."));
      assert(payment.status !== "approved", () => new PaymentSettledError(member));
      if (amount > group.splitAmount) {
        throw new ExceedsShareError(amount, group.splitAmount);
      }
      payment.paidAmount = amount;
      payment.status = "pending_approval";
      payment.updatedAt = nowIso(this.clock);
      return toRecord(groupName, member, payment, group.splitAmount);
    });

    this.audit.record(member, "SUBMIT_PAYMENT", "payment", paymentRef(groupName, member), { amount });
    return record;
  }

  decidePayment(groupName: string, admin: string, target: string, action: string): PaymentRecord {
    const decision = parseAction(action);
    const current = this.ledger.requireGroup(groupName);
    assert(
      current.admin === admin,
      () => new ForbiddenError("Only admin can approve payments.", "NOT_GROUP_ADMIN")
    );
    assert(paymentOf(current, target), () => new NotFoundError("User not in this group."));

    const { record, changed } = this.store.updateGroup(groupName, (group) => {
      const payment = paymentOf(group, target);
      assert(payment, () => new NotFoundError("User not in this group."));
      if (decision === "approve") {
        if (payment.status === "approved") {
          return { record: toRecord(groupName, target, payment, group.splitAmount), changed: false };
        }
        if (payment.status !== "pending_approval") {
          throw new PaymentNotPendingError(target, payment.status);
        }
        if (payment.paidAmount !== group.splitAmount) {
          throw new ShortPaymentError(payment.paidAmount, group.splitAmount);
        }
        payment.status = "approved";
      } else {
        payment.status = "denied";
      }
      payment.updatedAt = nowIso(this.clock);
      return { record: toRecord(groupName, target, payment, group.splitAmount), changed: true };
    });

    if (!changed) {
      return record;
    }
    const auditAction = decision === "approve" ? "APPROVE_PAYMENT" : "DENY_PAYMENT";
    this.audit.record(admin, auditAction, "payment", paymentRef(groupName, target), {
      status: record.status,
      paidAmount: record.paidAmount,
    });
    return record;
  }
}

export function parseAction(action: string): PaymentAction {
  const match = PAYMENT_ACTIONS.find((candidate) => candidate === action);
  if (!match) {
    throw new ValidationError(`Unsupported action "${action}". Use approve or deny.`);
  }
  return match;
}

function toRecord(groupName: string, username: string, payment: Payment, splitAmount: number): PaymentRecord {
  return { groupName, username, splitAmount, ...payment };
}

function paymentRef(groupName: string, username: string): string {
  return `${groupName}/${username}`;
}
