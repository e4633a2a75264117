import { z } from 'zod';
import { DEFAULT_CONFIG } from './types';
import type { Config } from './types';

const MAX_MINUTES = 65_535;

const minutes = z.number().int().min(0).max(MAX_MINUTES);

export const ConfigSchema = z.object({
  warn_after_minutes: minutes.default(DEFAULT_CONFIG.warn_after_minutes),
  danger_after_minutes: minutes.default(DEFAULT_CONFIG.danger_after_minutes),
  window_size: z
    .tuple([z.number().nonnegative(), z.number().nonnegative()])
    .default(DEFAULT_CONFIG.window_size),
  window_position: z
    .tuple([z.number().finite(), z.number().finite()])
    .default(DEFAULT_CONFIG.window_position),
  always_on_top: z.boolean().default(DEFAULT_CONFIG.always_on_top),
  start_unpaused: z.boolean().default(DEFAULT_CONFIG.start_unpaused),
  store_last_session: z.boolean().default(DEFAULT_CONFIG.store_last_session),
});

/** Validate raw parsed JSON, returning the config or a list of problems. */
export function validateConfig(
  raw: unknown,
): { valid: true; config: Config } | { valid: false; errors: string[] } {
  const result = ConfigSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, config: result.data };
  }

  const errors = result.error.issues.map((issue) => {
    const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${key}: ${issue.message}`;
  });
  return { valid: false, errors };
}
