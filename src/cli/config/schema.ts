/* src/cli/config/schema.ts
 * Zod schemas for relaunch.config.* (all keys optional; CLI flags fill gaps).
 */
import { z } from 'zod';

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = String(v).trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    return undefined;
  })
  .optional();

/** tmux rewrites "." and ":" in session names, which would defeat lookups. */
export const sessionNameSchema = z
  .string()
  .trim()
  .min(1, { message: 'session must be a non-empty string' })
  .refine((s) => !/[.:]/.test(s), {
    message: '"." and ":" are not allowed in session names',
  });

const environmentSchema = z
  .object({
    path: z.string().min(1).optional(),
    /** `false` provisions without installing anything. */
    manifest: z.union([z.string().min(1), z.literal(false)]).optional(),
    interpreter: z.string().min(1).optional(),
    verifyManifest: coerceBool,
  })
  .strict();
export type EnvironmentConfig = z.infer<typeof environmentSchema>;

export const cliDefaultsSchema = z
  .object({
    debug: coerceBool,
    boring: coerceBool,
  })
  .strict()
  .optional();
export type CliDefaults = z.infer<typeof cliDefaultsSchema>;

export const launchConfigSchema = z
  .object({
    session: sessionNameSchema.optional(),
    window: z.string().min(1).optional(),
    command: z.string().min(1).optional(),
    /** `false` disables provisioning even when flags would not. */
    environment: z.union([z.literal(false), environmentSchema]).optional(),
    lock: coerceBool,
    lockDir: z.string().min(1).optional(),
    tmux: z.string().min(1).optional(),
    cliDefaults: cliDefaultsSchema,
  })
  .strict();
export type LaunchConfig = z.infer<typeof launchConfigSchema>;
