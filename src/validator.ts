import { realDirectory } from './config.js';
import type { BuildConfig } from './types.js';

function validateSource(config: BuildConfig): string[] {
  const errors: string[] = [];
  if (config.source.length === 0) {
    errors.push('No source directory specified in the config file');
  }
  for (const dir of config.source) {
    if (!realDirectory(dir)) {
      errors.push(`Can not read source directory (${dir}), does it exist?`);
    }
  }
  return errors;
}

// The destination may not exist yet; it is created by the build
function validateDestination(config: BuildConfig): string[] {
  return config.destination ? [] : ['No destination directory specified in the config'];
}

function validateDocumentAssets(config: BuildConfig): string[] {
  return config.documentationAssets ? [] : ['No documentation assets directory specified'];
}

/**
 * Check the directories a build needs. Every check runs; the config is
 * valid when the returned list is empty.
 */
export function validate(config: BuildConfig): string[] {
  return [
    ...validateSource(config),
    ...validateDestination(config),
    ...validateDocumentAssets(config)
  ];
}
