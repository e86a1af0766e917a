// Shared helpers for reading environment flags. Engine code never reads the
// environment directly; hosts (the console program, scripts, tests) go
// through these so the lookups stay in one place.

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
 * says otherwise.
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
 * SOS_SEARCH_TRACE=1 promotes per-move search statistics (nodes, cutoffs,
 * chosen value) from debug to info in the game session log.
 */
export function isSearchTraceEnabled(): boolean {
  return flagEnabled('SOS_SEARCH_TRACE');
}
