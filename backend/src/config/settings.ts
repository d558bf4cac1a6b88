import { z } from 'zod';

export const SETTINGS = Symbol('SETTINGS');

export const RerankModeSchema = z.enum(['cross', 'bi']);
export type RerankMode = z.infer<typeof RerankModeSchema>;

const GenerationSchema = (defaults: {
  name: string;
  temperature: number;
  maxTokens: number;
}) =>
  z
    .object({
      name: z.string().min(1).default(defaults.name),
      temperature: z.number().min(0).max(2).default(defaults.temperature),
      topP: z.number().gt(0).max(1).default(0.9),
      maxTokens: z.number().int().positive().default(defaults.maxTokens),
    })
    .default({});

export const SettingsSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(8001),
      corsOrigin: z.string().default('*'),
    })
    .default({}),

  // Chat-completion upstream
  apiKey: z.string().trim().default(''),
  baseUrl: z
    .string()
    .url()
    .default('https://api.siliconflow.cn/v1/chat/completions'),
  timeoutMs: z.number().int().positive().default(30_000),
  model: GenerationSchema({
    name: 'Qwen/Qwen2.5-7B-Instruct',
    temperature: 0.7,
    maxTokens: 1024,
  }),

  retrieval: z
    .object({
      url: z.string().url().default('http://localhost:8000/search/docs'),
      timeoutMs: z.number().int().positive().default(15_000),
      topK: z.number().int().min(1).max(50).default(5),
      useRerank: z.boolean().default(true),
      rerankMode: RerankModeSchema.default('cross'),
      rerankTopK: z.number().int().min(1).max(50).nullable().default(null),
    })
    .default({}),

  rewriter: z
    .object({
      enabled: z.boolean().default(false),
      model: GenerationSchema({
        name: 'Qwen/Qwen2.5-7B-Instruct',
        temperature: 0.1,
        maxTokens: 128,
      }),
    })
    .default({}),
});

type DeepReadonly<T> = T extends object
  ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
  : T;

export type Settings = DeepReadonly<z.infer<typeof SettingsSchema>>;
export type SettingsInput = z.input<typeof SettingsSchema>;
export type GenerationParams = Settings['model'];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Builds the process-wide settings from the compiled-in defaults.
 * Overrides go through the same schema, so range checks apply to them too.
 */
export function loadSettings(overrides: SettingsInput = {}): Settings {
  return deepFreeze(SettingsSchema.parse(overrides));
}
