import { z } from 'zod';
import { schema as macSchema } from '@macauth/config';

const macKeys = z
  .string()
  .default('')
  .transform((value, ctx) => {
    const keys = new Map<string, string>();
    const entries = value
      .split(',')
      .map((entry) => entry.trim())
      .filter(Boolean);

    for (const entry of entries) {
      const colon = entry.indexOf(':');
      if (colon <= 0 || colon === entry.length - 1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'MAC_KEYS entries must look like id:secret' });
        return z.NEVER;
      }
      const id = entry.slice(0, colon);
      if (keys.has(id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `MAC_KEYS lists ${id} more than once` });
        return z.NEVER;
      }
      keys.set(id, entry.slice(colon + 1));
    }
    return keys;
  });

export const ConfigSchema = macSchema.extend({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HTTP_PORT: z.coerce.number().int().positive().default(3000),
  HTTP_HOST: z.string().default('0.0.0.0'),
  MAC_KEYS: macKeys
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | undefined;

export const loadConfig = (): Config => {
  if (!config) {
    config = ConfigSchema.parse(process.env);
  }
  return config;
};

export const resetConfig = () => {
  config = undefined;
};
