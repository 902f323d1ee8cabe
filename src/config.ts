import fs from 'fs-extra';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from './errors.js';
import { getMarkdownRenderer } from './markdown.js';
import { navLevels } from './types.js';
import type { BuildConfig, MarkdownRendererFactory, NavLevel, RawConfig, ResolvedDirectories } from './types.js';

export const CONFIG_FILE_NAME = 'swatchbook_config.yml';

const CONFIG_LOAD_FAILED =
  "Could not load config file, check the syntax or try 'swatchbook init' to get started";

export interface ResolveOptions {
  basePath: string;
  renderer?: MarkdownRendererFactory;
  pluginArgs?: readonly string[];
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a YAML config file. Relative paths in it are later resolved
 * against the directory holding the file.
 */
export function loadConfigFile(configFile: string): { raw: RawConfig; basePath: string } {
  let realFile: string;
  let document: unknown;

  try {
    realFile = fs.realpathSync(configFile);
    document = parseYaml(fs.readFileSync(realFile, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(CONFIG_LOAD_FAILED, { cause: error });
  }

  if (!isRawConfig(document)) {
    throw new ConfigurationError(CONFIG_LOAD_FAILED);
  }

  return { raw: document, basePath: path.dirname(realFile) };
}

function toList(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  const items = Array.isArray(value) ? value : [value];
  return items.filter((item): item is string | number => typeof item === 'string' || typeof item === 'number').map(String);
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string' && value !== '') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function isNavLevel(value: string): value is NavLevel {
  return navLevels.some(level => level === value);
}

function resolveNavLevel(value: unknown): NavLevel {
  const level = optionalString(value) ?? 'page';
  if (!isNavLevel(level)) {
    throw new ConfigurationError(`Unknown nav_level "${level}", expected one of: ${navLevels.join(', ')}`);
  }
  return level;
}

/**
 * Merge raw config values with defaults and resolve every path against
 * basePath.
 */
export function resolveConfig(raw: RawConfig, options: ResolveOptions): BuildConfig {
  const basePath = path.resolve(options.basePath);
  const resolvePath = (p: string | undefined) => (p === undefined ? undefined : path.resolve(basePath, p));

  const rendererName = optionalString(raw.custom_markdown) ?? 'default';
  const renderer = options.renderer ?? getMarkdownRenderer(rendererName);
  if (!renderer) {
    throw new ConfigurationError(`Unknown markdown renderer "${rendererName}"`);
  }

  return Object.freeze({
    basePath,
    source: toList(raw.source).map(dir => path.resolve(basePath, dir)),
    destination: resolvePath(optionalString(raw.destination)),
    documentationAssets: resolvePath(optionalString(raw.documentation_assets)),
    dependencies: toList(raw.dependencies).map(dir => path.resolve(basePath, dir)),
    index: optionalString(raw.index),
    navLevel: resolveNavLevel(raw.nav_level),
    customExtensions: toList(raw.custom_extensions),
    ignorePaths: toList(raw.ignore_paths),
    codeExampleTemplates: resolvePath(optionalString(raw.code_example_templates)),
    codeExampleRenderers: resolvePath(optionalString(raw.code_example_renderers)),
    exitOnWarnings: raw.exit_on_warnings === true,
    renderer,
    pluginArgs: [...(options.pluginArgs ?? [])],
    raw
  });
}

/**
 * Real path of dir when it is an existing directory
 */
export function realDirectory(dir: string | undefined): string | undefined {
  if (!dir) return undefined;
  try {
    return fs.statSync(dir).isDirectory() ? fs.realpathSync(dir) : undefined;
  } catch {
    return undefined;
  }
}

export function resolveDirectories(config: BuildConfig): ResolvedDirectories {
  return {
    inputDirs: config.source
      .map(dir => realDirectory(dir))
      .filter((dir): dir is string => dir !== undefined),
    outputDir: realDirectory(config.destination),
    docAssetsDir: realDirectory(config.documentationAssets)
  };
}
