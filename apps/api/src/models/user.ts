// apps/api/src/models/user.ts
import { Schema, Types, type Connection, type FilterQuery, type HydratedDocument, type Model } from 'mongoose';

export const ROLES = ['user', 'admin'] as const;
export type Role = (typeof ROLES)[number];

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

/** A stored user. `email` holds the ciphertext token, never the address. */
export interface UserRecord {
  id: string;
  emailLookup: string;
  email: string;
  passwordHash: string;
  role: Role;
  createdAt: Date;
  updatedAt: Date;
}

export interface UserFilter {
  id?: string;
  emailLookup?: string;
  role?: Role;
  // matches every record except this one
  excludeId?: string;
}

export type UserPatch = Partial<Pick<UserRecord, 'emailLookup' | 'email' | 'passwordHash' | 'role'>> & {
  updatedAt: Date;
};

export interface Pagination {
  skip: number;
  limit: number;
}

/**
 * Keyed document store for users. Lookups and the uniqueness check on
 * `emailLookup` are separate calls; callers get no atomicity across them.
 */
export interface UserStore {
  findOne(filter: UserFilter): Promise<UserRecord | null>;
  insertOne(record: UserRecord): Promise<string>;
  updateOne(filter: UserFilter, patch: UserPatch): Promise<number>;
  deleteOne(filter: UserFilter): Promise<number>;
  countDocuments(filter: UserFilter): Promise<number>;
  // newest first
  find(filter: UserFilter, page: Pagination): Promise<UserRecord[]>;
}

export function newUserId() {
  return new Types.ObjectId().toHexString();
}

export function isUserId(value: string) {
  return /^[0-9a-f]{24}$/i.test(value);
}

export interface IUser {
  _id: Types.ObjectId;
  emailLookup: string;
  email: string;
  passwordHash: string;
  role: Role;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<IUser>({
  // indexed but not unique: registration does its own check-then-insert
  emailLookup: { type: String, required: true, index: true },
  email: { type: String, required: true }, // encrypted
  passwordHash: { type: String, required: true },
  role: { type: String, enum: [...ROLES], required: true, default: 'user' },
  createdAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true },
});

export function userModel(conn: Connection): Model<IUser> {
  return conn.model<IUser>('User', UserSchema);
}

export function toQuery(filter: UserFilter): FilterQuery<IUser> {
  const query: FilterQuery<IUser> = {};
  if (filter.id !== undefined && filter.excludeId !== undefined) {
    query._id = { $eq: new Types.ObjectId(filter.id), $ne: new Types.ObjectId(filter.excludeId) };
  } else if (filter.id !== undefined) {
    query._id = new Types.ObjectId(filter.id);
  } else if (filter.excludeId !== undefined) {
    query._id = { $ne: new Types.ObjectId(filter.excludeId) };
  }
  if (filter.emailLookup !== undefined) query.emailLookup = filter.emailLookup;
  if (filter.role !== undefined) query.role = filter.role;
  return query;
}

export function toRecord(doc: HydratedDocument<IUser>): UserRecord {
  return {
    id: doc._id.toHexString(),
    emailLookup: doc.emailLookup,
    email: doc.email,
    passwordHash: doc.passwordHash,
    role: doc.role,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoUserStore implements UserStore {
  constructor(private readonly users: Model<IUser>) {}

  async findOne(filter: UserFilter) {
    const doc = await this.users.findOne(toQuery(filter)).exec();
    return doc ? toRecord(doc) : null;
  }

  async insertOne(record: UserRecord) {
    const { id, ...fields } = record;
    const created = await this.users.create({ _id: new Types.ObjectId(id), ...fields });
    return created._id.toHexString();
  }

  async updateOne(filter: UserFilter, patch: UserPatch) {
    const result = await this.users.updateOne(toQuery(filter), { $set: patch }).exec();
    return result.matchedCount;
  }

  async deleteOne(filter: UserFilter) {
    const result = await this.users.deleteOne(toQuery(filter)).exec();
    return result.deletedCount;
  }

  countDocuments(filter: UserFilter) {
    return this.users.countDocuments(toQuery(filter)).exec();
  }

  async find(filter: UserFilter, page: Pagination) {
    const docs = await this.users
      .find(toQuery(filter))
      .sort({ createdAt: -1 })
      .skip(page.skip)
      .limit(page.limit)
      .exec();
    return docs.map(toRecord);
  }
}
