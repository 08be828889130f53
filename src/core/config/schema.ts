/**
 * Schema of `.blueprint/config.yaml`.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't apply inner defaults of an object schema.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Where templates are looked up, in order. */
export const TemplateSettingsSchema = z.object({
  /** Directories holding one sub-directory per template; `~/` is the home directory */
  search_paths: z.array(z.string().min(1)).default(['.blueprint/templates']),
  /** Append the templates shipped with blueprint after the search paths */
  include_builtin: z.boolean().default(true),
});

export const LoggingSettingsSchema = z.object({
  level: LogLevelSchema.default('info'),
});

/** Choices offered by `blueprint init`. */
export const InitSettingsSchema = z.object({
  package_prefix: z.string().min(1).default('com.company'),
  platform_versions: z.array(z.string().min(1)).min(1).default(['7.2.0', '7.1.5', '7.0.10']),
});

export const ConfigSchema = z.object({
  templates: withDefaults(TemplateSettingsSchema),
  logging: withDefaults(LoggingSettingsSchema),
  init: withDefaults(InitSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type TemplateSettings = z.infer<typeof TemplateSettingsSchema>;
export type InitSettings = z.infer<typeof InitSettingsSchema>;
