// apps/api/src/app.ts
import express, { type NextFunction, type Request, type Response } from 'express';
import cors, { type CorsOptions } from 'cors';
import { ForbiddenError, sendError } from './lib/errors';
import { AccessGate } from './middleware/auth';
import type { UserStore } from './models/user';
import { adminRoutes } from './routes/admin';
import { authRoutes } from './routes/auth';
import { userRoutes } from './routes/user';
import { AdminService } from './services/admin';
import { CredentialService } from './services/credentials';
import { ProfileService } from './services/profile';

export interface AppDeps {
  users: UserStore;
  jwtSecret: string;
  encryptionKey: string;
  corsOrigins?: string[];
  now?: () => Date;
}

export function createApp(deps: AppDeps) {
  const { users, jwtSecret, encryptionKey, now } = deps;
  const allowedOrigins = deps.corsOrigins ?? [];

  const corsOptions: CorsOptions = {
    origin: (origin, callback) => {
      // allow requests with no origin (e.g. server-to-server/curl)
      if (!origin) return callback(null, true);
      const normalized = origin.replace(/\/+$/, '');
      if (allowedOrigins.includes(normalized)) return callback(null, true);
      return callback(new ForbiddenError('origin_not_allowed'));
    },
    optionsSuccessStatus: 200,
  };

  const gate = new AccessGate(jwtSecret, now);
  const credentials = new CredentialService({ users, jwtSecret, encryptionKey, now });
  const profiles = new ProfileService(users, encryptionKey, now);
  const admin = new AdminService(users, encryptionKey, now);

  const app = express();
  app.use(cors(corsOptions));
  app.use(express.json());

  app.use('/', authRoutes(credentials, gate));
  app.use('/user', userRoutes(profiles, gate));
  app.use('/admin', adminRoutes(admin, gate));

  app.get('/health', (_req: Request, res: Response) => res.json({ ok: true }));

  app.use((_req: Request, res: Response) => res.status(404).json({ error: 'not_found' }));

  // body-parser reports unparsable JSON as a 400 SyntaxError; everything else is ours
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      return res.status(400).json({ error: 'invalid_json' });
    }
    return sendError(res, err, 'request');
  });

  return app;
}
