const bootTime = Date.now();

function ts(): string {
  const delta = ((Date.now() - bootTime) / 1000).toFixed(1);
  return `+${delta}s`;
}

export interface Logger {
  debug(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Scoped stderr logger. `debug` is silent unless DEBUG is set: `DEBUG=1`
 * enables every scope, `DEBUG=cli,crontab` only the listed ones.
 */
export function createLogger(
  scope: string,
  env: NodeJS.ProcessEnv = process.env,
): Logger {
  const debugVar = env.DEBUG;
  const filter =
    debugVar && debugVar !== "1" ? new Set(debugVar.split(",")) : null;
  const active = !!debugVar && (!filter || filter.has(scope));

  return {
    debug(...args: unknown[]) {
      if (!active) return;
      console.error(`${ts()} [${scope}]`, ...args);
    },
    error(...args: unknown[]) {
      console.error(`${ts()} [${scope}] ERROR`, ...args);
    },
  };
}
