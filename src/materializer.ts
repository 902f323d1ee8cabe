import fs from 'fs-extra';
import path from 'path';
import type { Diagnostics } from './diagnostics.js';

/**
 * Write one generated page, replacing any previous file
 */
export function writePage(outputDir: string, fileName: string, content: string): void {
  fs.writeFileSync(path.join(outputDir, fileName), content);
}

/**
 * Copy every documentation asset into the output directory. Entries whose
 * name starts with an underscore (header, footer, partials) stay behind.
 */
export function copyAssets(docAssetsDir: string, outputDir: string): string[] {
  const copied: string[] = [];
  for (const item of fs.readdirSync(docAssetsDir)) {
    if (item.startsWith('_')) continue;

    const destPath = path.join(outputDir, item);
    fs.removeSync(destPath);
    fs.copySync(path.join(docAssetsDir, item), destPath);
    copied.push(item);
  }
  return copied;
}

/**
 * Copy each dependency directory into the output directory under its
 * base name. Failures are warnings; the remaining dependencies are still
 * copied.
 */
export function copyDependencies(dependencies: readonly string[], outputDir: string, diagnostics: Diagnostics): string[] {
  const copied: string[] = [];
  for (const dir of dependencies) {
    try {
      const dirPath = fs.realpathSync(dir);
      if (!fs.statSync(dirPath).isDirectory()) continue;

      const destPath = path.join(outputDir, path.basename(dirPath));
      fs.removeSync(destPath);
      fs.copySync(dirPath, destPath);
      copied.push(dir);
    } catch {
      diagnostics.warning(`Could not copy dependency: ${dir}`);
    }
  }
  return copied;
}
