import { z } from 'zod';

const optionalPositiveInt = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : Number.parseInt(value, 10)))
  .pipe(z.number().int().positive().optional());

export const schema = z.object({
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  MAC_NONCE_TTL_SECONDS: z.coerce.number().positive().default(60),
  // Falls back to the nonce TTL when unset.
  MAC_ID_TTL_SECONDS: z.coerce.number().positive().optional(),
  MAC_CACHE_MAX_SIZE: optionalPositiveInt,
  MAC_HASH_ALGORITHM: z.enum(['sha1', 'sha256', 'sha384', 'sha512']).default('sha1')
});

export type Config = z.infer<typeof schema>;

let cachedConfig: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.message}`);
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfig() {
  cachedConfig = null;
}
