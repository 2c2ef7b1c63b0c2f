import * as dotenv from 'dotenv';
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Loads the first env file found into `process.env` without overriding
 * variables that are already set.
 *
 * Looks for, in order: `envFile`, `$ENV_FILE`, `.env.local` and `.env` in
 * `cwd`.
 *
 * @returns the file that was loaded, or null
 */
export function loadEnv(
  opts: { envFile?: string; cwd?: string } = {},
): string | null {
  const cwd = opts.cwd ?? process.cwd();
  const candidates = [
    opts.envFile?.trim() || null,
    process.env.ENV_FILE?.trim() || null,
    path.resolve(cwd, '.env.local'),
    path.resolve(cwd, '.env'),
  ].filter((candidate): candidate is string => !!candidate);

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate, override: false });
      return candidate;
    }
  }
  return null;
}
