import { z } from 'zod';

export const configSchema = z.object({
  telegram: z.object({
    token: z.string().min(1),
  }),
  redis: z
    .object({
      url: z.string().url(),
      keyPrefix: z.string().min(1).default('suit-tally'),
    })
    .optional(),
  debounce: z.object({
    quietMs: z.number().int().positive().default(3000),
  }).default({}),
  processing: z.object({
    confirmationMarkers: z.array(z.string().min(1)).min(1).default(['✅', '🔰']),
    displayStyle: z.union([z.literal(1), z.literal(2), z.literal(3)]).default(1),
  }).default({}),
  autoReport: z.object({
    purgeLedger: z.boolean().default(false),
  }).default({}),
  persistence: z.object({
    flushIntervalMs: z.number().int().positive().default(1000),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }).default({}),
  health: z.object({
    enabled: z.boolean().default(true),
    port: z.number().int().positive().default(9090),
  }).default({}),
});

export type ValidatedConfig = z.infer<typeof configSchema>;
