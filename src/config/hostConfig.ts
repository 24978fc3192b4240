/**
 * Host configuration shared by both deployment targets.
 *
 * Values come from (highest first) CLI flags, config.json / the page-injected
 * object, then the defaults below.
 */

import { z } from 'zod';

import { BUTTONS } from '@/emulator/controllers/buttons';

/** NTSC NES refresh rate. */
export const DEFAULT_FPS = 60.098;

export const KeymapSchema = z.record(z.string().min(1), z.enum(BUTTONS));

export const GamepadConfigSchema = z.object({
  /** Standard-layout button index (as a string, JSON keys) → logical button. */
  buttons: z.record(z.string().regex(/^\d+$/), z.enum(BUTTONS)),
  /** Stick deflection that counts as a d-pad press. */
  axisThreshold: z.number().gt(0).lte(1).default(0.5),
});

export const HostConfigSchema = z.object({
  fps: z.number().positive().max(240).default(DEFAULT_FPS),
  catchUpCap: z.number().int().min(1).max(120).default(10),
  audio: z
    .object({
      enabled: z.boolean().default(true),
      /** Stereo frames the sink buffers before it reports not-ready. */
      bufferSize: z.number().int().min(1024).max(65536).default(8192),
    })
    .default({}),
  keymap: KeymapSchema.optional(),
  gamepad: GamepadConfigSchema.optional(),
  romPath: z.string().min(1).optional(),
  sentryDsn: z.string().url().optional(),
});

export type Keymap = z.infer<typeof KeymapSchema>;
export type GamepadConfig = z.infer<typeof GamepadConfigSchema>;
export type HostConfig = z.infer<typeof HostConfigSchema>;
export type HostConfigInput = z.input<typeof HostConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseHostConfig(input: unknown): HostConfig {
  const result = HostConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid host configuration: ${issues}`);
  }
  return result.data;
}
