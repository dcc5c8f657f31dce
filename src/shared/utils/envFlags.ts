// Shared helpers for reading environment flags. All raw process.env access
// for the engine goes through here so that config parsing and feature flags
// agree on what counts as "set".

type ProcessEnv = Record<string, string | undefined>;

function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(
  name: string,
  env: ProcessEnv | undefined = getProcessEnv()
): string | undefined {
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
 * is configured differently.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string, env?: ProcessEnv): boolean {
  const raw = readEnv(name, env ?? getProcessEnv());
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}
