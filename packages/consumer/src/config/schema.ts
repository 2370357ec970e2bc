import { z } from 'zod';

export const configSchema = z.object({
  redis: z.object({
    url: z.string().url(),
  }),
  mongodb: z.object({
    uri: z.string().min(1),
    collectionName: z.string().min(1).default('counters'),
    partitions: z.number().int().min(1).max(4096).default(128),
  }),
  stream: z.object({
    key: z.string().default('hitboard:hits'),
    consumerGroup: z.string().default('hitboard-group'),
    consumerId: z.string().default(`consumer-${process.pid}`),
    // Entries idle this long on another consumer are claimed on start; 0 disables
    claimIdleMs: z.number().int().min(0).default(60_000),
  }).default({}),
  batching: z.object({
    maxWaitMs: z.number().int().positive().default(500),
    maxMessages: z.number().int().positive().default(1000),
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
