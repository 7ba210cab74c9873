/**
 * Temp directory helpers.
 *
 * Callers remove what they create with `rm(path, { recursive: true, force: true })`.
 */

import { writeFileSync } from 'node:fs';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

/**
 * Create a fresh directory under the system temp root.
 */
export async function createTempDir(prefix: string = 'leo-lint-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

/**
 * Write an executable shell script, used as a stand-in compiler binary.
 *
 * @returns Full path to `<dir>/<name>.sh`.
 */
export function createTempScript(dir: string, name: string, content: string): string {
  const scriptPath = path.join(dir, `${name}.sh`);
  // eslint-disable-next-line security/detect-non-literal-fs-filename
  writeFileSync(scriptPath, content, { mode: 0o755 });
  return scriptPath;
}
