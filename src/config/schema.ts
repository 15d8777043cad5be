/* src/config/schema.ts
 * Zod schema for the "batch-exec" node of batch.config.*.
 */
import { z } from 'zod';

import { LOG_LEVELS } from '@/log/logger';

export const CONFIG_KEY = 'batch-exec';

// Boolean-ish: true/false, 1/0, "true"/"false", "1"/"0"
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v, ctx) => {
    if (typeof v === 'boolean') return v;
    const s = String(v).trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected a boolean (true/false/1/0), got ${JSON.stringify(v)}`,
    });
    return z.NEVER;
  })
  .optional();

export const lovSchema = z
  .record(z.string().min(1), z.record(z.string(), z.string()))
  .default({});

export const batchConfigSchema = z
  .object({
    fatal: coerceBool,
    echo: coerceBool,
    autoheader: coerceBool,
    leader: z.string().min(1, { message: 'leader must be non-empty' }).optional(),
    maxlen: z.coerce.number().int().min(4).optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    lov: lovSchema,
  })
  .strict();

export type BatchConfig = z.infer<typeof batchConfigSchema>;

/** Executive settings a config file may provide. */
export type BatchSettings = Omit<BatchConfig, 'lov'>;
