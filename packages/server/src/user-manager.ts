import type { ID, Role, PublicUser } from "@vtt/shared";
import type { DB, Statement } from "./db.js";
import { DuplicateUsernameError } from "./errors.js";
import type { PasswordHasher } from "./passwords.js";
import type { TokenService } from "./tokens.js";

export interface User extends PublicUser {
  passwordHash: string;
  registeredBy: ID | null;
}

interface UserRow {
  id: ID;
  username: string;
  password_hash: string;
  role: Role;
  registered_by: ID | null;
}

export type AuthResult =
  | { user: User; token: string }
  | { user: null; token: null };

function fromRow(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    role: row.role,
    passwordHash: row.password_hash,
    registeredBy: row.registered_by,
  };
}

export function toPublicUser(user: User): PublicUser {
  return { id: user.id, username: user.username, role: user.role };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "SQLITE_CONSTRAINT_UNIQUE";
}

/** Credential store plus the register/login flows on top of it. */
export class UserManager {
  private readonly byName: Statement<[string], UserRow>;
  private readonly byId: Statement<[ID], UserRow>;
  private readonly gmCount: Statement<[], { count: number }>;
  private readonly insert: Statement<[string, string, Role, ID | null]>;
  /** Hash checked against when the username is unknown, so both paths cost the same. */
  private dummyHash: Promise<string> | undefined;

  constructor(
    db: DB,
    private readonly hasher: PasswordHasher,
    private readonly tokens: TokenService,
  ) {
    this.byName = db.prepare<[string], UserRow>("SELECT * FROM users WHERE username = ?");
    this.byId = db.prepare<[ID], UserRow>("SELECT * FROM users WHERE id = ?");
    this.gmCount = db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM users WHERE role = 'gm'");
    this.insert = db.prepare<[string, string, Role, ID | null]>(
      "INSERT INTO users (username, password_hash, role, registered_by) VALUES (?, ?, ?, ?)"
    );
  }

  needsFirstUser(): boolean {
    return (this.gmCount.get()?.count ?? 0) === 0;
  }

  getUserById(id: ID): User | undefined {
    const row = this.byId.get(id);
    return row ? fromRow(row) : undefined;
  }

  getUserByUsername(username: string): User | undefined {
    const row = this.byName.get(username);
    return row ? fromRow(row) : undefined;
  }

  async register(username: string, password: string, role: Role = "player", registeredBy: ID | null = null): Promise<User> {
    if (this.byName.get(username)) {
      throw new DuplicateUsernameError(username);
    }

    const passwordHash = await this.hasher.hash(password);

    // The name may have been taken while hashing; the UNIQUE constraint decides.
    let id: ID;
    try {
      id = Number(this.insert.run(username, passwordHash, role, registeredBy).lastInsertRowid);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateUsernameError(username);
      }
      throw error;
    }

    console.log(`[auth] registered ${role} "${username}" (id ${id})`);
    return { id, username, role, passwordHash, registeredBy };
  }

  /**
   * Unknown user and wrong password look the same to the caller. Nothing is
   * written; the token is the only output.
   */
  async authenticate(username: string, password: string): Promise<AuthResult> {
    const row = this.byName.get(username);
    if (!row) {
      this.dummyHash ??= this.hasher.hash("placeholder-password");
      await this.hasher.verify(password, await this.dummyHash);
      return { user: null, token: null };
    }
    const user = fromRow(row);
    if (!(await this.hasher.verify(password, user.passwordHash))) {
      return { user: null, token: null };
    }
    return { user, token: this.tokens.issueToken(user.id, user.role) };
  }

  /** Creates the bootstrap gm account when the store has none. */
  async ensureAdminUser(username: string, password: string, isDefault = false): Promise<User | null> {
    if (!this.needsFirstUser()) {
      return null;
    }
    try {
      const user = await this.register(username, password, "gm");
      if (isDefault) {
        console.warn(`[auth] created gm "${username}" with the default password; set ADMIN_USERNAME and ADMIN_PASSWORD`);
      }
      return user;
    } catch (error) {
      if (error instanceof DuplicateUsernameError) {
        console.warn(`[auth] gm bootstrap skipped: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
