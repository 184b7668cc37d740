/**
 * ServerConfig
 * Process environment for the HTTP/WebSocket entry point
 */

import { z } from 'zod';

export const DEFAULT_PORT = 9999;

const envSchema = z.object({
  PORT: z.coerce
    .number({ invalid_type_error: 'PORT must be a number' })
    .int('PORT must be an integer')
    .min(0, 'PORT must be between 0 and 65535')
    .max(65535, 'PORT must be between 0 and 65535')
    .default(DEFAULT_PORT),
  HOST: z.string().min(1).default('0.0.0.0')
});

export type ServerConfig = {
  port: number;
  host: string;
};

/**
 * Read the server settings from an environment map. Empty values count as unset.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse({
    PORT: env.PORT === '' ? undefined : env.PORT,
    HOST: env.HOST === '' ? undefined : env.HOST
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid server environment: ${issue?.message ?? 'unknown error'}`);
  }

  return { port: parsed.data.PORT, host: parsed.data.HOST };
}
