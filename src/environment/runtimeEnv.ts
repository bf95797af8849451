/** Process-wide configuration handed to every child. Frozen once published. */
export type RuntimeEnvironment = Readonly<Record<string, string>>;

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Build the complete mapping first, then freeze it, so no reader can
 * observe a partially populated environment.
 */
export function publishEnvironment(
  ...layers: ReadonlyArray<Readonly<Record<string, string>>>
): RuntimeEnvironment {
  const entries: Record<string, string> = {};
  for (const layer of layers) {
    for (const [name, value] of Object.entries(layer)) {
      if (!VARIABLE_NAME.test(name)) {
        throw new TypeError(`Invalid environment variable name "${name}"`);
      }
      entries[name] = value;
    }
  }
  return Object.freeze(entries);
}

/**
 * Environment for a child process: the parent's variables, overlaid with
 * the runtime environment, per-child extras, then the bound display.
 */
export function childEnvironment(
  base: Readonly<Record<string, string | undefined>>,
  runtime: RuntimeEnvironment,
  extra: Readonly<Record<string, string>>,
  display: string,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(base)) {
    if (value !== undefined) env[name] = value;
  }
  return { ...env, ...runtime, ...extra, DISPLAY: display };
}

/** `KEY=value` lines, sorted, in environment-file format. */
export function formatEnvironmentFile(env: RuntimeEnvironment): string {
  return Object.keys(env)
    .sort()
    .map((name) => `${name}=${env[name] ?? ''}`)
    .join('\n')
    .concat('\n');
}
