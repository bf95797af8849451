/**
 * Live bootstrap logger.
 *
 * All output goes to stderr so stdout stays clean for the JSON report.
 * Emoji prefixes tell the phases apart at a glance.
 */

export type LogSink = (line: string) => void;

// ── Core write ──────────────────────────────────────────────

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

let sink: LogSink = stderrSink;

function write(message: string): void {
  sink(message);
}

/**
 * Redirect log output. Returns a function that restores the previous sink.
 */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function display(message: string): void {
  write(`🖥️  ${message}`);
}

export function browser(message: string): void {
  write(`🌐 ${message}`);
}

export function privilege(message: string): void {
  write(`🔐 ${message}`);
}

export function app(message: string): void {
  write(`🚀 ${message}`);
}

export function transition(from: string, to: string): void {
  write(`🔁 session ${from} → ${to}`);
}
