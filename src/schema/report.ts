import { z } from 'zod';

import { sessionOutcomeSchema, sessionTimelineSchema } from './session.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const REPORT_VERSION = '1.0' as const;

// ── Report ──────────────────────────────────────────────────

export const sessionReportSchema = z.object({
  version: z.literal(REPORT_VERSION),
  outcome: sessionOutcomeSchema,
  exitCode: z.number().int().nonnegative(),
  display: z.string().min(1),
  geometry: z.string().regex(/^\d+x\d+x\d+$/),
  browserVersion: z.string().nullable(),
  identity: z.string().nullable(),
  durationMs: z.number().int().nonnegative(),
  timeline: sessionTimelineSchema,
  error: z.string().nullable(),
});

export type SessionReport = z.infer<typeof sessionReportSchema>;

export function validateSessionReport(data: unknown): SessionReport {
  return sessionReportSchema.parse(data);
}
