// apps/api/src/index.ts
import { createApp } from './app';
import { loadConfig } from './lib/config';
import { connectDatabase } from './lib/db';
import { MongoUserStore, userModel } from './models/user';

async function main() {
  const config = loadConfig();
  const conn = await connectDatabase(config.mongoUri, config.mongoDbName);
  console.log('Connected to MongoDB');

  const app = createApp({
    users: new MongoUserStore(userModel(conn)),
    jwtSecret: config.jwtSecret,
    encryptionKey: config.encryptionKey,
    corsOrigins: config.corsOrigins,
  });
  app.listen(config.port, () => console.log(`API listening on http://localhost:${config.port}`));
}

// no degraded mode: without the database there is nothing to serve
main().catch((err) => {
  console.error('startup error', err);
  process.exit(1);
});
