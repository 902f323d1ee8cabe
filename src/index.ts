export { DocBuilder } from './builder.js';
export type { DocBuilderOptions, FromConfigFileOptions } from './builder.js';
export { CategoryIndex } from './categoryIndex.js';
export type { CategoryEntry } from './categoryIndex.js';
export { CodeExamples, loadCodeExamples, parseRendererDefinition } from './codeExamples.js';
export type { CodeExampleOptions, ExampleOutput, RendererDefinition } from './codeExamples.js';
export { CONFIG_FILE_NAME, loadConfigFile, realDirectory, resolveConfig, resolveDirectories } from './config.js';
export type { ResolveOptions } from './config.js';
export { Diagnostics, consoleReporter } from './diagnostics.js';
export type { DiagnosticsOptions } from './diagnostics.js';
export { DocParser, DEFAULT_EXTENSIONS, findSourceFiles } from './docParser.js';
export {
  ConfigurationError,
  ParserContractError,
  SwatchbookError,
  TemplateError,
  WarningsAsErrorsError
} from './errors.js';
export { setupDir } from './init.js';
export { LinkResolver } from './linkResolver.js';
export {
  createGfmRenderer,
  createHtmlRenderer,
  getMarkdownRenderer,
  registerMarkdownRenderer
} from './markdown.js';
export { copyAssets, copyDependencies, writePage } from './materializer.js';
export { pageTitle, renderPages } from './pageRenderer.js';
export { PluginHost } from './plugins.js';
export { compileTemplate, loadHeaderFooter } from './templateLoader.js';
export type { HeaderFooter, PageTemplate, TemplateData } from './templateLoader.js';
export { validate } from './validator.js';
export * from './types.js';
