import { z } from 'zod';

// ── SessionState ────────────────────────────────────────────

export const sessionStatusSchema = z.enum([
  'idle',
  'display_starting',
  'display_ready',
  'app_launched',
  'terminated',
]);

export type SessionStatus = z.infer<typeof sessionStatusSchema>;

export type SessionState =
  | { status: 'idle' }
  | { status: 'display_starting' }
  | { status: 'display_ready' }
  | { status: 'app_launched' }
  | { status: 'terminated'; exitCode: number };

// ── Timeline ────────────────────────────────────────────────

export const sessionTimelineSchema = z.object({
  displayRequestedAt: z.number().int().nonnegative().optional(),
  displayReadyAt: z.number().int().nonnegative().optional(),
  appLaunchedAt: z.number().int().nonnegative().optional(),
  appExitedAt: z.number().int().nonnegative().optional(),
  terminatedAt: z.number().int().nonnegative().optional(),
});

export type SessionTimeline = z.infer<typeof sessionTimelineSchema>;

// ── Outcome ─────────────────────────────────────────────────

export const sessionOutcomeSchema = z.enum([
  'app_exited',
  'app_not_launched',
  'display_unavailable',
  'provisioning_failed',
  'permission_denied',
  'config_error',
  'interrupted',
  'internal_error',
]);

export type SessionOutcome = z.infer<typeof sessionOutcomeSchema>;
