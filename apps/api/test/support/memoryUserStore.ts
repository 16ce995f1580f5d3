import type { Pagination, UserFilter, UserPatch, UserRecord, UserStore } from '../../src/models/user';

function matches(user: UserRecord, filter: UserFilter) {
  if (filter.id !== undefined && user.id !== filter.id) return false;
  if (filter.excludeId !== undefined && user.id === filter.excludeId) return false;
  if (filter.emailLookup !== undefined && user.emailLookup !== filter.emailLookup) return false;
  if (filter.role !== undefined && user.role !== filter.role) return false;
  return true;
}

/** In-process stand-in for MongoUserStore. Every call yields once, like a driver round trip. */
export class MemoryUserStore implements UserStore {
  readonly records: UserRecord[] = [];

  async findOne(filter: UserFilter) {
    await Promise.resolve();
    const found = this.records.find((u) => matches(u, filter));
    return found ? { ...found } : null;
  }

  async insertOne(record: UserRecord) {
    await Promise.resolve();
    this.records.push({ ...record });
    return record.id;
  }

  async updateOne(filter: UserFilter, patch: UserPatch) {
    await Promise.resolve();
    const found = this.records.find((u) => matches(u, filter));
    if (!found) return 0;
    Object.assign(found, patch);
    return 1;
  }

  async deleteOne(filter: UserFilter) {
    await Promise.resolve();
    const i = this.records.findIndex((u) => matches(u, filter));
    if (i < 0) return 0;
    this.records.splice(i, 1);
    return 1;
  }

  async countDocuments(filter: UserFilter) {
    await Promise.resolve();
    return this.records.filter((u) => matches(u, filter)).length;
  }

  async find(filter: UserFilter, page: Pagination) {
    await Promise.resolve();
    return this.records
      .filter((u) => matches(u, filter))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(page.skip, page.skip + page.limit)
      .map((u) => ({ ...u }));
  }
}
