import path from 'path';

// Minimal env vars that are safe and commonly needed by test runners.
// Secrets must be explicitly allowlisted.
export const BASELINE_ENV_KEYS = [
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'TERM',
  'COLORTERM',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'TMP',
  'TEMP',
  'XDG_CONFIG_HOME',
  'XDG_CACHE_HOME',
  'XDG_DATA_HOME',
  'NODE_ENV',
  'VIRTUAL_ENV',
  // Windows
  'USERPROFILE',
  'APPDATA',
  'LOCALAPPDATA',
  'SYSTEMROOT',
  'COMSPEC',
  'PATHEXT',
  'HOMEDRIVE',
  'HOMEPATH',
];

export interface EnvPolicy {
  envAllowlist?: string[];
  /** Directories placed in front of PATH */
  pathPrepend?: string[];
}

export function getSafeEnv(
  policy: EnvPolicy,
  baseEnv: NodeJS.ProcessEnv,
  requestEnv?: Record<string, string>,
): Record<string, string> {
  const safeEnv: Record<string, string> = {};
  const combinedEnv: NodeJS.ProcessEnv = { ...baseEnv, ...requestEnv };

  for (const key of [...BASELINE_ENV_KEYS, ...(policy.envAllowlist ?? [])]) {
    const value = combinedEnv[key];
    if (value === undefined) continue;
    safeEnv[key] = value;
  }

  // Explicit request values always pass.
  Object.assign(safeEnv, requestEnv);

  const pathValue = combinedEnv.PATH ?? combinedEnv.Path;
  const entries = [...(policy.pathPrepend ?? []), ...(pathValue ? [pathValue] : [])];
  if (entries.length > 0) {
    safeEnv.PATH = entries.join(path.delimiter);
  }

  return safeEnv;
}
