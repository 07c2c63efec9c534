import { z } from 'zod';

const DurationSchema = z.union([z.string(), z.number().nonnegative()]);

export const ConfigSchema = z.object({
  engine: z
    .object({
      /** Applied to parallel/foreach steps that leave max_concurrency at 0 */
      default_max_concurrency: z.number().int().min(1).max(100).optional(),
      max_loop_iterations: z.number().int().min(1).max(100).default(100),
      default_step_timeout: DurationSchema.optional(),
    })
    .default({}),
  retry: z
    .object({
      default_max_attempts: z.number().int().min(1).default(1),
      default_backoff_base: DurationSchema.default('1s'),
      max_backoff: DurationSchema.default('60s'),
    })
    .default({}),
  env: z
    .object({
      /** Environment variables exposed to templates as `.env.NAME` */
      allow: z.array(z.string()).default([]),
      /** Every variable starting with one of these prefixes is exposed too */
      prefixes: z.array(z.string()).default(['STEPWRIGHT_']),
    })
    .default({}),
  storage: z
    .object({
      redact_secrets: z.boolean().default(true),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
