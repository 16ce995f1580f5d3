// apps/api/src/services/profile.ts
import { BadRequestError, ConflictError, NotFoundError } from '../lib/errors';
import { decryptField, deriveEmailLookup, encryptField } from '../lib/fieldCipher';
import { hashPassword } from '../lib/passwords';
import type { Principal } from '../lib/sessionToken';
import { parseBody, updateProfileBody } from '../lib/validation';
import { isUserId, type UserPatch, type UserRecord, type UserStore } from '../models/user';

export interface UserView {
  id: string;
  email: string;
  role: UserRecord['role'];
  createdAt: Date;
  updatedAt: Date;
}

// the only place stored emails are turned back into plaintext for a response
export function toUserView(user: UserRecord, encryptionKey: string): UserView {
  return {
    id: user.id,
    email: decryptField(user.email, encryptionKey),
    role: user.role,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

export class ProfileService {
  constructor(
    private readonly users: UserStore,
    private readonly encryptionKey: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async getProfile(principal: Principal) {
    if (!isUserId(principal.id)) throw new BadRequestError('invalid_user_id');
    const user = await this.users.findOne({ id: principal.id });
    if (!user) throw new NotFoundError();
    return toUserView(user, this.encryptionKey);
  }

  async updateProfile(principal: Principal, body: unknown) {
    if (!isUserId(principal.id)) throw new BadRequestError('invalid_user_id');
    const { email, password } = parseBody(updateProfileBody, body);
    if (email === undefined && password === undefined) throw new BadRequestError('missing_fields');

    const patch: UserPatch = { updatedAt: this.now() };
    if (email !== undefined) {
      const emailLookup = deriveEmailLookup(email);
      const taken = await this.users.countDocuments({ emailLookup, excludeId: principal.id });
      if (taken > 0) throw new ConflictError('email_in_use');
      patch.emailLookup = emailLookup;
      patch.email = encryptField(email, this.encryptionKey);
    }
    if (password !== undefined) {
      patch.passwordHash = await hashPassword(password);
    }

    const matched = await this.users.updateOne({ id: principal.id }, patch);
    if (matched === 0) throw new NotFoundError();
  }
}
