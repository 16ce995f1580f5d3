// apps/api/src/services/admin.ts
import { BadRequestError, NotFoundError } from '../lib/errors';
import { isRole, isUserId, type UserStore } from '../models/user';
import { toUserView, type UserView } from './profile';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface PageRequest {
  page: number;
  limit: number;
}

export interface UserPage {
  users: UserView[];
  total: number;
  page: number;
  limit: number;
  total_pages: number;
}

function positiveInt(raw: unknown) {
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}

/** Reads `page` and `limit` from a query string; bad values fall back to the defaults. */
export function parsePageRequest(query: { page?: unknown; limit?: unknown }): PageRequest {
  const requested = positiveInt(query.limit);
  const limit = requested !== undefined && requested <= MAX_PAGE_SIZE ? requested : DEFAULT_PAGE_SIZE;
  const page = positiveInt(query.page) ?? 1;
  // the skip handed to the store has to stay an exact integer
  return { page: Number.isSafeInteger((page - 1) * limit) ? page : 1, limit };
}

export class AdminService {
  constructor(
    private readonly users: UserStore,
    private readonly encryptionKey: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async listUsers({ page, limit }: PageRequest): Promise<UserPage> {
    const total = await this.users.countDocuments({});
    const records = await this.users.find({}, { skip: (page - 1) * limit, limit });
    return {
      users: records.map((u) => toUserView(u, this.encryptionKey)),
      total,
      page,
      limit,
      total_pages: Math.ceil(total / limit),
    };
  }

  async deleteUser(id: string) {
    if (!isUserId(id)) throw new BadRequestError('invalid_user_id');
    const deleted = await this.users.deleteOne({ id });
    if (deleted === 0) throw new NotFoundError();
  }

  async updateUserRole(id: string, role: string) {
    if (!isUserId(id)) throw new BadRequestError('invalid_user_id');
    if (!isRole(role)) throw new BadRequestError('invalid_role');
    const matched = await this.users.updateOne({ id }, { role, updatedAt: this.now() });
    if (matched === 0) throw new NotFoundError();
  }
}
