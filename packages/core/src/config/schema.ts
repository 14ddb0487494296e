import { z } from "zod";

export const StrainerConfigSchema = z
  .object({
    $schema: z.string().optional(),

    // Input polling
    pollIntervalMs: z.number().int().min(1).max(1000).optional(),
    batchSize: z.number().int().min(1).max(10_000).optional(),

    // Display
    prompt: z.string().optional(),

    // Diagnostics
    log: z
      .object({
        enabled: z.boolean().optional(),
        dir: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type StrainerConfig = z.infer<typeof StrainerConfigSchema>;

/** Config with every default filled in */
export interface ResolvedConfig {
  pollIntervalMs: number;
  batchSize: number;
  prompt: string;
  log: { enabled: boolean; dir?: string };
}

export const DEFAULT_CONFIG = {
  pollIntervalMs: 33,
  batchSize: 10,
  prompt: "filter> ",
  log: { enabled: false },
} as const satisfies ResolvedConfig;
