// apps/api/src/lib/db.ts
import mongoose from 'mongoose';

const CONNECT_TIMEOUT_MS = 10_000;

/**
 * Opens the single connection the process shares. Only this initial connect
 * is bounded; queries issued later carry no deadline of their own.
 */
export async function connectDatabase(uri: string, dbName: string) {
  const conn = mongoose.createConnection(uri, {
    dbName,
    serverSelectionTimeoutMS: CONNECT_TIMEOUT_MS,
  });
  await conn.asPromise();
  return conn;
}
