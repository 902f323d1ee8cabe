import { globSync } from 'glob';
import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { CONFIG_FILE_NAME } from './config.js';
import type { Diagnostics } from './diagnostics.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const SCAFFOLD_DIR = path.resolve(__dirname, '../scaffold');

/**
 * Create a config file, header/footer and code example templates in
 * targetDir. Does nothing when a config file is already there.
 */
export function setupDir(targetDir: string, diagnostics: Diagnostics): string[] {
  if (fs.existsSync(path.join(targetDir, CONFIG_FILE_NAME))) {
    diagnostics.warning(`Cowardly refusing to overwrite existing ${CONFIG_FILE_NAME}`);
    return [];
  }

  fs.copySync(SCAFFOLD_DIR, targetDir, { overwrite: false });

  const created = globSync('**/*', { cwd: SCAFFOLD_DIR, mark: true }).sort();
  diagnostics.created(created);
  return created;
}
