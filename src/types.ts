import type { CategoryEntry, CategoryIndex } from './categoryIndex.js';

// Raw configuration, as read from swatchbook_config.yml
export interface RawConfig {
  source?: string | string[];
  destination?: string;
  documentation_assets?: string;
  dependencies?: string[] | null;
  index?: string;
  nav_level?: string;
  custom_extensions?: string | string[];
  ignore_paths?: string[];
  code_example_templates?: string;
  code_example_renderers?: string;
  custom_markdown?: string;
  exit_on_warnings?: boolean;
  plugins?: string[];
  [key: string]: unknown;
}

export type NavLevel = 'page' | 'section' | 'all';

export const navLevels: readonly NavLevel[] = ['page', 'section', 'all'];

// Resolved configuration. Every path is absolute.
export interface BuildConfig {
  readonly basePath: string;
  readonly source: readonly string[];
  readonly destination?: string;
  readonly documentationAssets?: string;
  readonly dependencies: readonly string[];
  readonly index?: string;
  readonly navLevel: NavLevel;
  readonly customExtensions: readonly string[];
  readonly ignorePaths: readonly string[];
  readonly codeExampleTemplates?: string;
  readonly codeExampleRenderers?: string;
  readonly exitOnWarnings: boolean;
  readonly renderer: MarkdownRendererFactory;
  readonly pluginArgs: readonly string[];
  readonly raw: Readonly<RawConfig>;
}

export interface ResolvedDirectories {
  inputDirs: string[];
  outputDir?: string;
  docAssetsDir?: string;
}

// Documentation blocks
export interface ContentBlock {
  name: string;
  title: string;
  category?: string;
  parent?: string;
  markdown: string;
  level: number;
  meta: Record<string, unknown>;
}

export interface MarkdownPage {
  kind: 'markdown';
  blocks: ContentBlock[];
  markdown: string;
}

export interface TemplatePage {
  kind: 'template';
  source: string;
}

export type Page = MarkdownPage | TemplatePage;

// Output file name (with extension) -> page
export type PageMap = Map<string, Page>;

export interface ParseResult {
  pages: PageMap;
  categories: CategoryIndex;
}

export interface ParseOptions {
  navLevel: NavLevel;
  customExtensions: readonly string[];
  ignorePaths: readonly string[];
}

// Data every header, footer and template page is rendered against
export type RenderContext = Readonly<{
  title: string;
  file_name: string;
  blocks: readonly ContentBlock[] | undefined;
  categories: readonly CategoryEntry[];
  pages: ReadonlyMap<string, Page>;
  config: Readonly<RawConfig>;
}>;

// Collaborators
export interface LinkTarget {
  name: string;
  componentNames: string[];
}

export interface ComponentLinker {
  resolve(componentName: string): string | undefined;
}

export interface MarkdownRenderer {
  render(markdown: string): string;
}

export interface CodeExampleRenderer {
  name: string;
  renderExample(code: string): string;
  renderTable(examples: string[]): string;
}

export interface CodeExampleLookup {
  get(name: string): CodeExampleRenderer | undefined;
}

export interface MarkdownRendererOptions {
  linkResolver: ComponentLinker;
  codeExamples: CodeExampleLookup;
}

export type MarkdownRendererFactory = (options: MarkdownRendererOptions) => MarkdownRenderer;

export interface SourceParser {
  parse(
    inputDirs: readonly string[],
    index: string | undefined,
    plugins: PluginContext,
    options: ParseOptions
  ): ParseResult;
}

export interface Plugin {
  name: string;
  block?(block: ContentBlock, file: string): void;
  finalize?(pages: PageMap): void;
}

export interface PluginContext {
  block(block: ContentBlock, file: string): void;
  finalize(pages: PageMap): void;
}

// Diagnostics
export type DiagnosticLevel = 'error' | 'warning' | 'info' | 'success';

export interface Diagnostic {
  level: DiagnosticLevel;
  message: string;
}

export type DiagnosticReporter = (diagnostic: Diagnostic) => void;

// Helper to turn a category label into its page file name
export function pageFileName(label: string): string {
  return label.replace(/ /g, '_').toLowerCase() + '.html';
}
