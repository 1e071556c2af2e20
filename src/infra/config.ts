import { z } from 'zod';

const serviceEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  JWT_SECRET: z.string({ required_error: 'JWT_SECRET environment variable is required' }).min(1),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60),
});

export interface ServiceConfig {
  port: number;
  jwtSecret: string;
  accessTokenExpireMinutes: number;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = serviceEnvSchema.parse(env);
  return {
    port: parsed.PORT,
    jwtSecret: parsed.JWT_SECRET,
    accessTokenExpireMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
  };
}
