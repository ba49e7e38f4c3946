import { z } from "zod";

const feedEntrySchema = z.object({
  url: z.string().url(),
  category: z.string().min(1).optional(),
  title: z.string().min(1).optional(),
});

export const syncConfigSchema = z.object({
  maxConcurrency: z.number().int().positive().default(8),
  timeoutMs: z.number().int().positive().default(10_000),
  retries: z.number().int().nonnegative().default(1),
  retryDelayMs: z.number().int().nonnegative().default(500),
  userAgent: z.string().min(1).default("Feedkeeper/0.1 (+local feed reader)"),
});

export const appConfigSchema = z.object({
  sync: syncConfigSchema.default({}),
  schedule: z
    .object({
      sync: z.string().min(1).optional(),
    })
    .default({}),
  fullText: z
    .object({
      selectors: z
        .array(z.string().min(1))
        .min(1)
        .default(["article", "main", "[role=main]", "body"]),
      timeoutMs: z.number().int().positive().default(15_000),
    })
    .default({}),
  feeds: z.array(feedEntrySchema).default([]),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type SyncConfig = z.infer<typeof syncConfigSchema>;
export type FeedEntryConfig = z.infer<typeof feedEntrySchema>;
