import { z } from 'zod';

import {
  BROWSER_DEFAULTS,
  DISPLAY_DEFAULTS,
  TIMEOUTS,
  UNBUFFERED_VARIABLES,
} from '../config/defaults.js';

const environmentVariableName = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Invalid environment variable name');

// ── Display block ───────────────────────────────────────────

export const colorDepthSchema = z.union([
  z.literal(8),
  z.literal(15),
  z.literal(16),
  z.literal(24),
  z.literal(30),
  z.literal(32),
]);

export type ColorDepth = z.infer<typeof colorDepthSchema>;

export const displayConfigSchema = z.object({
  number: z.number().int().nonnegative().default(DISPLAY_DEFAULTS.NUMBER),
  width: z.number().int().positive().default(DISPLAY_DEFAULTS.WIDTH),
  height: z.number().int().positive().default(DISPLAY_DEFAULTS.HEIGHT),
  depth: colorDepthSchema.default(DISPLAY_DEFAULTS.DEPTH),
  /** Seconds to wait for the display socket. */
  readyTimeout: z.number().positive().default(TIMEOUTS.DISPLAY_READY / 1000),
  serverPath: z.string().min(1).default(DISPLAY_DEFAULTS.SERVER_PATH),
  serverArgs: z.array(z.string()).default([]),
  socketDir: z.string().min(1).default(DISPLAY_DEFAULTS.SOCKET_DIR),
});

export type DisplayConfig = z.infer<typeof displayConfigSchema>;

// ── Browser block ───────────────────────────────────────────

export const browserConfigSchema = z.object({
  path: z.string().min(1).optional(),
  required: z.boolean().default(true),
  probe: z.boolean().default(false),
  /** Seconds allowed for the reachability probe. */
  probeTimeout: z.number().positive().default(TIMEOUTS.BROWSER_PROBE / 1000),
  versionVariable: environmentVariableName.default(BROWSER_DEFAULTS.VERSION_VARIABLE),
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

// ── Application block ───────────────────────────────────────

export const appConfigSchema = z.object({
  command: z.array(z.string().min(1)).min(1).optional(),
  cwd: z.string().min(1).optional(),
  env: z.record(environmentVariableName, z.string()).default({}),
  /** Seconds between a forwarded signal and SIGKILL. */
  gracePeriod: z.number().positive().default(TIMEOUTS.APP_GRACE_PERIOD / 1000),
  unbuffered: z.array(environmentVariableName).default([...UNBUFFERED_VARIABLES]),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  display: displayConfigSchema.default({}),
  browser: browserConfigSchema.default({}),
  app: appConfigSchema.default({}),
  user: z.string().min(1).optional(),
  group: z.string().min(1).optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
