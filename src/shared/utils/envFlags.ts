// Shared helpers for reading environment flags. The engine under src/shared
// must not depend on the CLI config module, so the few switches it honours
// are read here directly from process.env when one exists.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else by a .env file.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * Engine trace output (every accepted and rejected move). Off unless
 * FTF_ENGINE_DEBUG=1.
 */
export function isEngineDebugEnabled(): boolean {
  return flagEnabled('FTF_ENGINE_DEBUG');
}

/**
 * Debug logging wrapper for flag-gated diagnostics in shared code, which
 * has no logger of its own.
 *
 * @example
 * debugLog(isEngineDebugEnabled(), '[GameEngine] move accepted', event);
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
