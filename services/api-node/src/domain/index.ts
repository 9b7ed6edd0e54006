import { env } from "../config/env.js";
import { type Clock, systemClock } from "../utils/time.js";
import { AccessGate } from "./access.js";
import { AuditTrail } from "./audit.js";
import { CredentialStore } from "./credentials.js";
import { GroupLedger } from "./ledger.js";
import { PaymentWorkflow } from "./payments.js";
import { InMemoryStore, type SettlementStore } from "./store.js";
import { TokenService, type TokenServiceOptions } from "./tokens.js";

export interface ServiceOptions {
  store?: SettlementStore;
  clock?: Clock;
  tokens?: Partial<TokenServiceOptions>;
  passwordMinLength?: number;
}

export interface Services {
  store: SettlementStore;
  audit: AuditTrail;
  credentials: CredentialStore;
  tokens: TokenService;
  gate: AccessGate;
  ledger: GroupLedger;
  payments: PaymentWorkflow;
}

export function createServices(options: ServiceOptions = {}): Services {
  const clock = options.clock ?? systemClock;
  const store = options.store ?? new InMemoryStore(clock);
  const audit = new AuditTrail(store);
  const tokens = new TokenService(
    {
      secret: env.JWT_SECRET,
      algorithm: env.JWT_ALGORITHM,
      accessTtlMinutes: env.ACCESS_TOKEN_TTL_MINUTES,
      refreshTtlDays: env.REFRESH_TOKEN_TTL_DAYS,
      ...options.tokens,
    },
    clock
  );
  const ledger = new GroupLedger(store, audit, clock);
  return {
    store,
    audit,
    tokens,
    gate: new AccessGate(tokens),
    ledger,
    credentials: new CredentialStore(
      store,
      ledger,
      audit,
      options.passwordMinLength ?? env.PASSWORD_MIN_LENGTH,
      clock
    ),
    payments: new PaymentWorkflow(store, ledger, audit, clock),
  };
}

export const services = createServices();

export function resetServicesForTests(): void {
  services.store.reset();
}
