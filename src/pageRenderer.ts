import type { CategoryIndex } from './categoryIndex.js';
import { ParserContractError } from './errors.js';
import { LinkResolver } from './linkResolver.js';
import { writePage } from './materializer.js';
import { compileTemplate } from './templateLoader.js';
import type { HeaderFooter } from './templateLoader.js';
import type { CodeExampleLookup, MarkdownRendererFactory, Page, PageMap, RawConfig, RenderContext } from './types.js';

export interface RenderPagesOptions {
  pages: PageMap;
  categories: CategoryIndex;
  config: Readonly<RawConfig>;
  outputDir: string;
  templates: HeaderFooter;
  renderer: MarkdownRendererFactory;
  codeExamples: CodeExampleLookup;
}

/**
 * Title shown for a page: empty for a page with no blocks, otherwise the
 * label of the first category that points at it
 */
export function pageTitle(fileName: string, page: Page, categories: CategoryIndex): string {
  if (page.kind === 'markdown' && page.blocks.length === 0) return '';
  return categories.labelFor(fileName) ?? '';
}

/**
 * Render every page in map order and write it to outputDir. Markdown
 * pages are wrapped in the header and footer; template pages are written
 * as they render.
 */
export function renderPages(options: RenderPagesOptions): string[] {
  const { pages, categories, config, outputDir, templates } = options;
  const markdown = options.renderer({
    linkResolver: LinkResolver.fromPages(pages),
    codeExamples: options.codeExamples
  });
  const categoryEntries = Object.freeze(categories.toEntries());
  const written: string[] = [];

  for (const [fileName, page] of pages) {
    if (!fileName) {
      throw new ParserContractError('Found a page without a file name; every page needs a category.');
    }

    const context: RenderContext = Object.freeze({
      title: pageTitle(fileName, page, categories),
      file_name: fileName,
      blocks: page.kind === 'markdown' ? page.blocks : undefined,
      categories: categoryEntries,
      pages,
      config
    });

    switch (page.kind) {
      case 'template': {
        const template = compileTemplate(page.source, fileName);
        writePage(outputDir, fileName, template(context));
        break;
      }
      case 'markdown': {
        const body = markdown.render(page.markdown);
        const header = templates.header?.(context) ?? '';
        const footer = templates.footer?.(context) ?? '';
        writePage(outputDir, fileName, header + body + footer);
        break;
      }
    }
    written.push(fileName);
  }

  return written;
}
