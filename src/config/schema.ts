import { z } from "zod";

export const providerNames = [
  "anthropic",
  "openai",
  "gemini",
  "ollama",
  "lmstudio",
] as const;

export type ProviderName = (typeof providerNames)[number];

const cronExpressionSchema = z.string().min(1);

export const portSchema = z.coerce.number().int().min(1).max(65535);

export const appConfigSchema = z.object({
  llm: z.object({
    provider: z.enum(providerNames),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2).default(0.3),
    timeoutMs: z.number().int().positive().default(60000),
  }),
  github: z
    .object({
      apiBaseUrl: z.string().url().default("https://api.github.com"),
      perPage: z.number().int().min(1).max(100).default(100),
      timeoutMs: z.number().int().positive().default(30000),
      maxConcurrency: z.number().int().positive().default(5),
    })
    .default({}),
  slack: z
    .object({
      timeoutMs: z.number().int().positive().default(10000),
    })
    .default({}),
  summarization: z
    .object({
      maxConcurrency: z.number().int().positive().default(10),
    })
    .default({}),
  run: z
    .object({
      sinceHours: z.number().int().positive().default(24),
      sampleMode: z.boolean().default(false),
    })
    .default({}),
  schedule: z
    .object({
      run: cronExpressionSchema.optional(),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
