import fs from 'fs-extra';
import { loadConfigFile, realDirectory, resolveConfig, resolveDirectories } from './config.js';
import { loadCodeExamples } from './codeExamples.js';
import { Diagnostics } from './diagnostics.js';
import { DocParser } from './docParser.js';
import { copyAssets, copyDependencies } from './materializer.js';
import { renderPages } from './pageRenderer.js';
import { PluginHost } from './plugins.js';
import { loadHeaderFooter } from './templateLoader.js';
import { pageFileName } from './types.js';
import type { BuildConfig, MarkdownRendererFactory, Plugin, SourceParser } from './types.js';
import { validate } from './validator.js';

export interface DocBuilderOptions {
  diagnostics?: Diagnostics;
  parser?: SourceParser;
  plugins?: readonly Plugin[];
}

export interface FromConfigFileOptions extends DocBuilderOptions {
  args?: readonly string[];
  renderer?: MarkdownRendererFactory;
}

/**
 * Builds a styleguide from a resolved configuration: validate, load
 * header and footer, parse sources, render pages, then copy dependencies
 * and documentation assets.
 */
export class DocBuilder {
  readonly config: BuildConfig;
  readonly diagnostics: Diagnostics;
  private readonly parser: SourceParser;
  private readonly plugins: PluginHost;

  constructor(config: BuildConfig, options: DocBuilderOptions = {}) {
    this.config = config;
    this.diagnostics = options.diagnostics ?? new Diagnostics();
    if (config.exitOnWarnings) {
      this.diagnostics.failOnWarnings = true;
    }
    this.parser = options.parser ?? new DocParser(this.diagnostics);
    this.plugins = new PluginHost(config.raw, config.pluginArgs, options.plugins);
  }

  static fromConfigFile(configFile: string, options: FromConfigFileOptions = {}): DocBuilder {
    const { raw, basePath } = loadConfigFile(configFile);
    const config = resolveConfig(raw, { basePath, renderer: options.renderer, pluginArgs: options.args });
    return new DocBuilder(config, options);
  }

  /**
   * Errors that make the configuration unusable; empty when valid
   */
  validate(): string[] {
    return validate(this.config);
  }

  isValid(): boolean {
    return this.validate().length === 0;
  }

  /**
   * Returns false when validation fails, before anything is written.
   * Errors after validation are thrown; pages already written stay.
   */
  build(): boolean {
    const { config, diagnostics } = this;
    const { destination } = config;
    const errors = this.validate();
    if (errors.length > 0 || !destination) {
      errors.forEach(error => diagnostics.error(error));
      return false;
    }

    let dirs = resolveDirectories(config);
    const templates = loadHeaderFooter(dirs.docAssetsDir, diagnostics);

    let outputDir = dirs.outputDir;
    if (!outputDir) {
      fs.ensureDirSync(destination);
      dirs = resolveDirectories(config);
      outputDir = dirs.outputDir ?? destination;
    }

    const { pages, categories } = this.parser.parse(dirs.inputDirs, config.index, this.plugins, {
      navLevel: config.navLevel,
      customExtensions: config.customExtensions,
      ignorePaths: config.ignorePaths
    });

    if (config.index && !pages.has(pageFileName(config.index))) {
      diagnostics.warning(
        `Could not generate index.html, there was no content generated for the category ${config.index}.`
      );
    }
    if (!dirs.docAssetsDir) {
      diagnostics.warning(`Could not find documentation assets at ${config.documentationAssets}`);
    }

    const written = renderPages({
      pages,
      categories,
      config: config.raw,
      outputDir,
      templates,
      renderer: config.renderer,
      codeExamples: loadCodeExamples({
        templatesDir: this.optionalDirectory(config.codeExampleTemplates, 'code example templates'),
        renderersDir: this.optionalDirectory(config.codeExampleRenderers, 'code example renderers')
      })
    });
    diagnostics.info(`Wrote ${written.length} pages to ${outputDir}`);

    copyDependencies(config.dependencies, outputDir, diagnostics);
    if (dirs.docAssetsDir) {
      copyAssets(dirs.docAssetsDir, outputDir);
    }

    diagnostics.success('Build completed. (-: ');
    return true;
  }

  private optionalDirectory(dir: string | undefined, description: string): string | undefined {
    if (!dir) return undefined;
    const resolved = realDirectory(dir);
    if (!resolved) {
      this.diagnostics.warning(`Could not find ${description} at ${dir}, using the built-in ones`);
    }
    return resolved;
  }
}
