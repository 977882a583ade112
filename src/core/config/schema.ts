import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../../utils/logger.js';

/**
 * Make a nested object optional, filling its inner defaults when absent.
 * Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Logging settings. */
export const LoggingSettingsSchema = z.object({
  level: z.enum(LOG_LEVEL_NAMES).default('info'),
});

/** Post-creation hook settings. */
export const HookSettingsSchema = z.object({
  /** Run the template's hook commands after creation */
  enabled: z.boolean().default(true),
});

/** Fragment lookup settings. */
export const FragmentSettingsSchema = z.object({
  /** Root holding one fragment directory per template; defaults to the packaged templates/ */
  directory: z.string().min(1).optional(),
  /** Appended to a file's basename to find its fragment */
  suffix: z.string().min(1).default('.hbs'),
});

/** Full configuration schema. An empty document means all defaults. */
export const ConfigSchema = withDefaults(
  z.object({
    logging: withDefaults(LoggingSettingsSchema),
    hooks: withDefaults(HookSettingsSchema),
    fragments: withDefaults(FragmentSettingsSchema),
  })
);

export type Config = z.infer<typeof ConfigSchema>;
export type LoggingSettings = z.infer<typeof LoggingSettingsSchema>;
export type HookSettings = z.infer<typeof HookSettingsSchema>;
export type FragmentSettings = z.infer<typeof FragmentSettingsSchema>;
