import { z } from 'zod';

/**
 * Centralised configuration schema for rowtree.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Default depth guard for tree assembly; 0 disables it
  TREE_MAX_DEPTH: z.coerce.number().int().min(0).default(0),

  // Validate duplicate ids and parent-id cycles before assembling
  TREE_STRICT: z
    .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
    .transform((value) => value === true || value === 'true' || value === '1')
    .default(false),

  // Records per partition when grouping concurrently
  TREE_PARTITION_SIZE: z.coerce.number().int().min(1).default(1024),
});

export type AppConfig = z.infer<typeof configSchema>;
