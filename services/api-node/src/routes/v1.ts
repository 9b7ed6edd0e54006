import { Router } from "express";
import { z } from "zod";
import { ROLE_VALUES, type Group, type Payment } from "@splitledger/shared";
import { services } from "../domain/index.js";
import type { PaymentRecord } from "../domain/payments.js";
import { authClaims, bearerToken, requireAuth, requireRole } from "../middleware/auth.js";

export const v1Router = Router();

const formBoolean = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0", "on", "off"])])
  .transform((value) => value === true || value === "true" || value === "1" || value === "on");

const groupList = z
  .union([z.string(), z.array(z.string())])
  .default("")
  .transform((value) => (Array.isArray(value) ? value : value.split(",")))
  .transform((names) => names.map((name) => name.trim()).filter(Boolean));

v1Router.get("/health", (_request, response) => {
  response.json({
    data: {
      service: "splitledger-api-node",
      status: "ok",
      timestamp: new Date().toISOString(),
    },
  });
});

v1Router.post("/register", (request, response) => {
  const payload = z
    .object({
      username: z.string().trim().min(1),
      password: z.string().min(1),
      role: z.enum(ROLE_VALUES).default("user"),
      groups: groupList,
    })
    .parse(request.body);
  const user = services.credentials.register(payload);
  response.status(201).json({
    data: {
      msg: "User registered successfully",
      username: user.username,
      roles: user.roles,
      groups: user.groups,
    },
  });
});

v1Router.post("/login", (request, response) => {
  const payload = z
    .object({
      username: z.string().min(1),
      password: z.string().min(1),
    })
    .parse(request.body);
  const user = services.credentials.authenticate(payload.username, payload.password);
  const subject = { subject: user.username, roles: user.roles, groups: user.groups };
  response.json({
    data: {
      access_token: services.tokens.issueAccessToken(subject).token,
      refresh_token: services.tokens.issueRefreshToken(subject).token,
      token_type: "bearer",
    },
  });
});

v1Router.post("/refresh", (request, response) => {
  const issued = services.tokens.refresh(bearerToken(request));
  response.json({
    data: {
      access_token: issued.token,
      token_type: "bearer",
    },
  });
});

v1Router.get("/protected", requireAuth, (request, response) => {
  const claims = authClaims(request);
  response.json({
    data: {
      msg: `Hello ${claims.subject}`,
      roles: claims.roles,
    },
  });
});

v1Router.get("/admin/users", requireAuth, requireRole(["admin"]), (_request, response) => {
  const users = Object.fromEntries(
    services.credentials.list().map((user) => [user.username, { roles: user.roles, groups: user.groups }])
  );
  response.json({ data: { users } });
});

v1Router.get("/admin/audit/logs", requireAuth, requireRole(["admin"]), (request, response) => {
  const query = z
    .object({
      action: z.string().optional(),
      limit: z.coerce.number().int().positive().max(500).optional(),
    })
    .parse(request.query);
  response.json({ data: services.audit.list(query) });
});

v1Router.get("/admin/audit/verify", requireAuth, requireRole(["admin"]), (_request, response) => {
  response.json({ data: services.audit.verify() });
});

v1Router.post("/groups/create", requireAuth, (request, response) => {
  const payload = z
    .object({
      group_name: z.string().trim().min(1),
      budget: z.coerce.number(),
      add_creator: formBoolean.default(true),
    })
    .parse(request.body);
  const group = services.ledger.createGroup({
    name: payload.group_name,
    admin: authClaims(request).subject,
    budget: payload.budget,
    includeAdminAsMember: payload.add_creator,
  });
  response.status(201).json({
    data: {
      msg: `Group '${group.name}' created`,
      group: groupView(group),
    },
  });
});

v1Router.post("/groups/add-user", (request, response) => {
  const payload = z
    .object({
      username: z.string().trim().min(1),
      group_name: z.string().trim().min(1),
    })
    .parse(request.body);
  const { group } = services.ledger.addMember(payload.group_name, payload.username);
  response.json({
    data: {
      msg: `User '${payload.username}' added`,
      split_per_member: group.splitAmount,
    },
  });
});

v1Router.post("/groups/:name/pay", requireAuth, (request, response) => {
  const payload = z.object({ amount: z.coerce.number() }).parse(request.body);
  const record = services.payments.submitPayment(
    request.params.name,
    authClaims(request).subject,
    payload.amount
  );
  response.json({
    data: {
      msg: "Payment submitted, pending approval",
      payment: paymentView(record),
    },
  });
});

v1Router.post("/groups/:name/approve", requireAuth, (request, response) => {
  const payload = z
    .object({
      username: z.string().trim().min(1),
      action: z.string().trim().min(1),
    })
    .parse(request.body);
  const record = services.payments.decidePayment(
    request.params.name,
    authClaims(request).subject,
    payload.username,
    payload.action
  );
  response.json({
    data: {
      msg: `${record.username}'s payment ${record.status}`,
      payment: paymentView(record),
    },
  });
});

v1Router.get("/groups/:name/status", requireAuth, (request, response) => {
  const group = services.ledger.getStatus(request.params.name, authClaims(request).subject);
  response.json({ data: { group: groupView(group) } });
});

v1Router.get("/groups", (_request, response) => {
  response.json({ data: { groups: services.ledger.listGroups().map(groupView) } });
});

function groupView(group: Group) {
  return {
    name: group.name,
    admin: group.admin,
    budget: group.budget,
    members: group.members,
    split_amount: group.splitAmount,
    payments: Object.fromEntries(
      Object.entries(group.payments).map(([username, payment]) => [username, paymentEntry(payment)])
    ),
    created_at: group.createdAt,
  };
}

function paymentEntry(payment: Payment) {
  return {
    paid_amount: payment.paidAmount,
    status: payment.status,
  };
}

function paymentView(record: PaymentRecord) {
  return {
    group_name: record.groupName,
    username: record.username,
    split_amount: record.splitAmount,
    ...paymentEntry(record),
  };
}
