import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

const clientEnvSchema = z.object({
  NOTES_API_URL: z.string().url().default('http://localhost:3000'),
  NOTES_TOKEN_FILE: z.string().min(1).optional(),
});

export interface ClientConfig {
  baseUrl: string;
  tokenFile: string;
}

export function defaultTokenFile(): string {
  return join(homedir(), '.notes-vault', 'token.json');
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = clientEnvSchema.parse(env);
  return {
    baseUrl: parsed.NOTES_API_URL,
    tokenFile: parsed.NOTES_TOKEN_FILE ?? defaultTokenFile(),
  };
}
