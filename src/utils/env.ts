import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = '.env';
let loadedEnvPath: string | undefined;

function isMissingFile(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

function load(envPath: string): string {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved, override: true });
  loadedEnvPath = resolved;
  // a missing .env is normal in containers; anything else is a broken file
  if (result.error && !isMissingFile(result.error)) {
    throw result.error;
  }
  return resolved;
}

/**
 * Loads variables for the service and the CLI. The file is, in order: the
 * explicit path (`--env`), `LEXINORM_ENV_FILE`, then `./.env`.
 * Returns the resolved path that was read.
 */
export function loadEnvironment(envPath?: string): string {
  return load(envPath ?? process.env.LEXINORM_ENV_FILE ?? DEFAULT_ENV_PATH);
}

/** Re-reads whichever file was loaded last; used by the config reload route. */
export function reloadEnvironment(): string {
  return loadedEnvPath ? load(loadedEnvPath) : loadEnvironment();
}
