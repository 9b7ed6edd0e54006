import type { User, UserRole } from "@splitledger/shared";
import { ConflictError, NotFoundError, UnauthorizedError, ValidationError, assert } from "../utils/errors.js";
import { hashPassword, newSalt, verifyPassword } from "../utils/crypto.js";
import { type Clock, nowIso, systemClock } from "../utils/time.js";
import type { AuditTrail } from "./audit.js";
import type { GroupLedger } from "./ledger.js";
import type { SettlementStore } from "./store.js";

export interface RegisterInput {
  username: string;
  password: string;
  role: UserRole;
  groups: string[];
}

/** A user record without its password material. */
export type UserView = Pick<User, "username" | "roles" | "groups" | "createdAt">;

// Unknown usernames are hashed against this salt so a miss costs as much as a wrong password.
const DUMMY_SALT = newSalt();
const DUMMY_HASH = hashPassword("unused-password", DUMMY_SALT);

export class CredentialStore {
  constructor(
    private readonly store: SettlementStore,
    private readonly ledger: GroupLedger,
    private readonly audit: AuditTrail,
    private readonly passwordMinLength: number,
    private readonly clock: Clock = systemClock
  ) {}

  register(input: RegisterInput): UserView {
    const username = input.username.trim();
    assert(username.length > 0, () => new ValidationError("Username is required."));
    assert(
      input.password.length >= this.passwordMinLength,
      () => new ValidationError(`Password must be at least ${this.passwordMinLength} characters.`, "WEAK_PASSWORD")
    );
    assert(
      !this.store.findUser(username),
      () => new ConflictError("USER_EXISTS", "User already exists.", 400)
    );

    const groups = [...new Set(input.groups.map((group) => group.trim()).filter(Boolean))];
    const missing = groups.filter((group) => !this.store.findGroup(group));
    assert(missing.length === 0, () => new NotFoundError(`Group not found: ${missing.join(", ")}.`));

    const salt = newSalt();
    this.store.insertUser({
      username,
      passwordHash: hashPassword(input.password, salt),
      salt,
      roles: [input.role],
      groups: [],
      createdAt: nowIso(this.clock),
    });
    this.audit.record(username, "REGISTER_ACCOUNT", "user", username, { role: input.role });

    for (const group of groups) {
      this.ledger.addMember(group, username);
    }
    return this.get(username);
  }

  /** Fails the same way for an unknown user and a wrong password. */
  authenticate(username: string, password: string): UserView {
    const user = this.store.findUser(username);
    if (!user) {
      verifyPassword(password, DUMMY_SALT, DUMMY_HASH);
      throw invalidCredentials();
    }
    assert(verifyPassword(password, user.salt, user.passwordHash), invalidCredentials);
    this.audit.record(user.username, "LOGIN_SUCCESS", "user", user.username);
    return toView(user);
  }

  get(username: string): UserView {
    const user = this.store.findUser(username);
    assert(user, () => new NotFoundError("User not found."));
    return toView(user);
  }

  list(): UserView[] {
    return this.store.listUsers().map(toView);
  }
}

function toView(user: User): UserView {
  return {
    username: user.username,
    roles: [...user.roles],
    groups: [...user.groups],
    createdAt: user.createdAt,
  };
}

function invalidCredentials(): UnauthorizedError {
  return new UnauthorizedError("Invalid credentials.", "INVALID_CREDENTIALS");
}
