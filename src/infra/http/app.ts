import express from 'express';
import type { TokenSettings } from '../../application/auth/tokens.js';
import type { NoteRepo } from '../db/noteRepo.js';
import type { UserRepo } from '../db/userRepo.js';
import { createAuthRoutes } from './routes/auth.js';
import { createNotesRoutes } from './routes/notes.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';

export interface AppDeps {
  userRepo: UserRepo;
  noteRepo: NoteRepo;
  tokenSettings: TokenSettings;
  /** Resolves when the database answers. */
  checkDatabase: () => Promise<void>;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDeps): express.Application {
  const app = express();

  app.use(express.json());
  app.use(createApiRateLimiter());

  // Health check (no auth required)
  app.get('/healthz', (_req, res) => {
    void withTimeout(deps.checkDatabase(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  app.use(createSwaggerRoutes());

  app.use(createAuthRoutes({ userRepo: deps.userRepo, tokenSettings: deps.tokenSettings }));
  app.use(
    createNotesRoutes({
      userRepo: deps.userRepo,
      noteRepo: deps.noteRepo,
      jwtSecret: deps.tokenSettings.secret,
    })
  );

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
