import { isAbsolute, resolve } from 'node:path';

/** File name used when neither --file nor TASK_CLI_FILE is given */
export const DEFAULT_STORE_FILE = 'tasks.json';

/** Environment variable that overrides the store location */
export const STORE_FILE_ENV = 'TASK_CLI_FILE';

/**
 * Resolve the tasks file path.
 * Priority: explicit option > TASK_CLI_FILE > tasks.json in the working directory.
 */
export function resolveStorePath(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const configured = explicitPath || env[STORE_FILE_ENV] || DEFAULT_STORE_FILE;
  return isAbsolute(configured) ? configured : resolve(cwd, configured);
}
