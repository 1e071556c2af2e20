import dotenv from 'dotenv';
import { loadServiceConfig } from '../config.js';
import { NoteRepo } from '../db/noteRepo.js';
import { pingDatabase } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { createApp } from './app.js';

dotenv.config();

const config = loadServiceConfig();

const app = createApp({
  userRepo: new UserRepo(),
  noteRepo: new NoteRepo(),
  tokenSettings: {
    secret: config.jwtSecret,
    expiresInMinutes: config.accessTokenExpireMinutes,
  },
  checkDatabase: pingDatabase,
});

app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/healthz`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
});

export default app;
