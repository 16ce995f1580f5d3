// apps/api/src/services/credentials.ts
import { ConflictError, ForbiddenError, BadRequestError, UnauthorizedError } from '../lib/errors';
import { decryptField, deriveEmailLookup, encryptField } from '../lib/fieldCipher';
import { hashPassword, verifyPassword } from '../lib/passwords';
import { issueSessionToken, type Principal } from '../lib/sessionToken';
import { parseBody, registerBody, loginBody } from '../lib/validation';
import { isRole, newUserId, type Role, type UserRecord, type UserStore } from '../models/user';

export interface CredentialServiceOptions {
  users: UserStore;
  jwtSecret: string;
  encryptionKey: string;
  now?: () => Date;
}

export interface LoginResult {
  token: string;
  role: Role;
}

/**
 * Registration and login. Every call stands alone; the store is the only
 * shared state.
 */
export class CredentialService {
  private readonly users: UserStore;
  private readonly jwtSecret: string;
  private readonly encryptionKey: string;
  private readonly now: () => Date;

  constructor(opts: CredentialServiceOptions) {
    this.users = opts.users;
    this.jwtSecret = opts.jwtSecret;
    this.encryptionKey = opts.encryptionKey;
    this.now = opts.now ?? (() => new Date());
  }

  /**
   * Public registration. Always creates a `user`; a requested `admin` role
   * is not honoured here (see registerAdmin).
   */
  async register(body: unknown) {
    const { email, password, role } = parseBody(registerBody, body);
    if (role !== undefined && !isRole(role)) throw new BadRequestError('invalid_role');
    if (role === 'admin') {
      console.warn('register: ignoring requested admin role on public registration');
    }
    return this.createUser(email, password, 'user');
  }

  /**
   * Creates an admin. Open while no admin exists yet; after that the caller
   * must itself be an admin.
   */
  async registerAdmin(body: unknown, caller?: Principal) {
    if (caller?.role !== 'admin') {
      const admins = await this.users.countDocuments({ role: 'admin' });
      if (admins > 0) throw caller ? new ForbiddenError() : new UnauthorizedError();
    }
    const { email, password, role } = parseBody(registerBody, body);
    if (role !== undefined && role !== 'admin') throw new BadRequestError('invalid_role');
    return this.createUser(email, password, 'admin');
  }

  login(body: unknown) {
    return this.authenticate(body, false);
  }

  loginAdmin(body: unknown) {
    return this.authenticate(body, true);
  }

  private async createUser(email: string, password: string, role: Role) {
    const emailLookup = deriveEmailLookup(email);
    // not atomic with the insert below: two concurrent registrations can both pass
    const existing = await this.users.findOne({ emailLookup });
    if (existing) throw new ConflictError('user_exists');

    const passwordHash = await hashPassword(password);
    const now = this.now();
    const record: UserRecord = {
      id: newUserId(),
      emailLookup,
      email: encryptField(email, this.encryptionKey),
      passwordHash,
      role,
      createdAt: now,
      updatedAt: now,
    };
    const id = await this.users.insertOne(record);
    return { id, role };
  }

  private async authenticate(body: unknown, adminOnly: boolean): Promise<LoginResult> {
    const { email, password } = parseBody(loginBody, body);

    // unknown email and wrong password share one answer
    const user = await this.users.findOne({ emailLookup: deriveEmailLookup(email) });
    if (!user) throw new UnauthorizedError('invalid_credentials');
    const valid = await verifyPassword(user.passwordHash, password);
    if (!valid) throw new UnauthorizedError('invalid_credentials');

    if (adminOnly && user.role !== 'admin') throw new ForbiddenError();

    const token = issueSessionToken(
      { id: user.id, email: decryptField(user.email, this.encryptionKey), role: user.role },
      this.jwtSecret,
      { now: this.now() }
    );
    return { token, role: user.role };
  }
}
