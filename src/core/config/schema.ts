/**
 * @arch propweave.core.domain.schema
 */
import { z } from 'zod';

/**
 * Make a nested object optional and fill its defaults when missing.
 * Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Naming conventions; empty lists fall back to the built-in defaults. */
export const ConventionsConfigSchema = z.object({
  field_prefixes: z.array(z.string()).default([]),
  property_suffixes: z.array(z.string()).default([]),
  getter_prefixes: z.array(z.string()).default([]),
  setter_prefixes: z.array(z.string()).default([]),
  ignore_marker: z.string().min(1).optional(),
});

/** Which source files make up the analysed project. */
export const ProjectConfigSchema = z.object({
  /** tsconfig.json to load; `include` is only globbed without one */
  tsconfig: z.string().optional(),
  include: z.array(z.string()).default(['src/**/*.ts']),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/*.d.ts',
    '**/*.test.ts',
    '**/*.spec.ts',
  ]),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  conventions: withDefaults(ConventionsConfigSchema),
  project: withDefaults(ProjectConfigSchema),
  log_level: LogLevelSchema.default('info'),
});

export type ConventionsConfig = z.infer<typeof ConventionsConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
