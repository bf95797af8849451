import type { BootstrapSettings } from '../config/settings.js';
import type { BootstrapOutcome } from '../core/pipeline.js';
import { formatDisplay } from '../display/readiness.js';
import { describeIdentity } from '../privilege/boundary.js';
import { REPORT_VERSION, validateSessionReport } from '../schema/report.js';
import type { SessionReport } from '../schema/report.js';

// Re-export contract types for consumers
export type { SessionReport };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  outcome: BootstrapOutcome,
  settings: BootstrapSettings,
): SessionReport {
  const { display } = settings;
  return validateSessionReport({
    version: REPORT_VERSION,
    outcome: outcome.outcome,
    exitCode: outcome.exitCode,
    display: formatDisplay(display.number),
    geometry: `${String(display.width)}x${String(display.height)}x${String(display.depth)}`,
    browserVersion: outcome.environment?.[settings.browser.versionVariable] ?? null,
    identity: outcome.identity !== null ? describeIdentity(outcome.identity) : null,
    durationMs: Math.max(0, outcome.finishedAt - outcome.startedAt),
    timeline: outcome.timeline,
    error: outcome.error?.message ?? null,
  });
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(report: SessionReport): string {
  return JSON.stringify(report, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Operator summary ─────────────────────────────────────────

/** Human-readable block for stderr, printed after every run. */
export function formatSummary(report: SessionReport): string {
  const lines = [
    '',
    '--- Session Result ---',
    `Outcome:  ${report.outcome}`,
    `Exit:     ${String(report.exitCode)}`,
    `Display:  ${report.display} (${report.geometry})`,
    `Browser:  ${report.browserVersion ?? 'unknown'}`,
    `User:     ${report.identity ?? 'unchanged'}`,
    `Time:     ${(report.durationMs / 1000).toFixed(1)}s`,
  ];
  if (report.error !== null) {
    lines.push(`Error:    ${report.error}`);
  }
  return lines.join('\n') + '\n\n';
}
