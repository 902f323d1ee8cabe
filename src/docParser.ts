import { globSync } from 'glob';
import fs from 'fs-extra';
import path from 'path';
import { CategoryIndex } from './categoryIndex.js';
import { extractComments, parseBlock } from './extractor.js';
import type { DocumentationBlock } from './extractor.js';
import type { Diagnostics } from './diagnostics.js';
import { pageFileName } from './types.js';
import type {
  ContentBlock,
  NavLevel,
  PageMap,
  ParseOptions,
  ParseResult,
  PluginContext,
  SourceParser
} from './types.js';

export const DEFAULT_EXTENSIONS = ['.css', '.scss', '.sass', '.less', '.styl', '.js', '.jsx', '.md', '.markdown'];

const TEMPLATE_PAGE_SUFFIX = '.html.ejs';
const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);
const MAX_HEADING_LEVEL = 6;

interface BlockNode {
  block: DocumentationBlock;
  children: BlockNode[];
}

function escapeHtml(str: string): string {
  return str.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/**
 * Find documentable files in dir, sorted, relative to dir
 */
export function findSourceFiles(dir: string, options: Pick<ParseOptions, 'customExtensions' | 'ignorePaths'>): string[] {
  const extensions = new Set([
    ...DEFAULT_EXTENSIONS,
    ...options.customExtensions.map(ext => (ext.startsWith('.') ? ext : `.${ext}`))
  ]);

  return globSync('**/*', {
    cwd: dir,
    nodir: true,
    ignore: [...options.ignorePaths, '**/node_modules/**']
  })
    .filter(file => file.endsWith(TEMPLATE_PAGE_SUFFIX) || extensions.has(path.extname(file)))
    .sort();
}

function headingFor(block: DocumentationBlock, level: number): string {
  return `<h${level} id="${escapeHtml(block.name)}" class="styleguide">${escapeHtml(block.title)}</h${level}>`;
}

function navList(nodes: BlockNode[], nested: boolean, indent = ''): string {
  const items = nodes.map(node => {
    const link = `<a href="#${escapeHtml(node.block.name)}">${escapeHtml(node.block.title)}</a>`;
    if (!nested || node.children.length === 0) {
      return `${indent}<li>${link}</li>`;
    }
    return `${indent}<li>${link}\n${navList(node.children, nested, indent + '  ')}\n${indent}</li>`;
  });
  const className = indent === '' ? ' class="section-nav"' : '';
  return `${indent}<ul${className}>\n${items.join('\n')}\n${indent}</ul>`;
}

/**
 * Markdown for one category page: optional navigation, then every block
 * as an anchored heading followed by its own markdown
 */
function pageMarkdown(roots: BlockNode[], navLevel: NavLevel): { blocks: ContentBlock[]; markdown: string } {
  const blocks: ContentBlock[] = [];
  const parts: string[] = [];

  if (navLevel !== 'page') {
    parts.push(navList(roots, navLevel === 'all'));
  }

  const walk = (node: BlockNode, level: number) => {
    const { block } = node;
    blocks.push({
      name: block.name,
      title: block.title,
      category: block.category,
      parent: block.parent,
      markdown: block.markdown,
      level,
      meta: block.meta
    });
    parts.push(headingFor(block, level));
    if (block.markdown) parts.push(block.markdown);
    for (const child of node.children) {
      walk(child, Math.min(level + 1, MAX_HEADING_LEVEL));
    }
  };
  roots.forEach(root => walk(root, 1));

  return { blocks, markdown: parts.join('\n\n') + '\n' };
}

/**
 * Reads doc comments from source directories and groups them into one
 * page per category.
 */
export class DocParser implements SourceParser {
  constructor(private readonly diagnostics: Diagnostics) {}

  parse(
    inputDirs: readonly string[],
    index: string | undefined,
    plugins: PluginContext,
    options: ParseOptions
  ): ParseResult {
    const pages: PageMap = new Map();
    const blocks = new Map<string, DocumentationBlock>();

    for (const dir of inputDirs) {
      for (const file of findSourceFiles(dir, options)) {
        const fullPath = path.join(dir, file);
        const content = fs.readFileSync(fullPath, 'utf-8');

        if (file.endsWith(TEMPLATE_PAGE_SUFFIX)) {
          pages.set(path.basename(file, '.ejs'), { kind: 'template', source: content });
          continue;
        }

        const texts = MARKDOWN_EXTENSIONS.has(path.extname(file)) ? [content] : extractComments(content);
        for (const text of texts) {
          const block = parseBlock(text, fullPath, this.diagnostics);
          if (!block) continue;
          if (blocks.has(block.name)) {
            this.diagnostics.warning(`Documentation block "${block.name}" in ${fullPath} replaces an earlier block with the same name.`);
            blocks.delete(block.name);
          }
          blocks.set(block.name, block);
        }
      }
    }

    const categories = new CategoryIndex();
    for (const [category, roots] of this.groupByCategory(blocks)) {
      const fileName = pageFileName(category);
      const { blocks: pageBlocks, markdown } = pageMarkdown(roots, options.navLevel);
      for (const block of pageBlocks) {
        plugins.block(block, blocks.get(block.name)?.file ?? fileName);
      }
      categories.set(category, fileName);
      pages.set(fileName, { kind: 'markdown', blocks: pageBlocks, markdown });
    }

    if (index) {
      const indexPage = pages.get(pageFileName(index));
      if (indexPage && pageFileName(index) !== 'index.html') {
        pages.set('index.html', { ...indexPage });
      }
    }

    plugins.finalize(pages);
    return { pages, categories };
  }

  private groupByCategory(blocks: Map<string, DocumentationBlock>): Map<string, BlockNode[]> {
    const nodes = new Map<string, BlockNode>();
    for (const [name, block] of blocks) {
      nodes.set(name, { block, children: [] });
    }

    const grouped = new Map<string, BlockNode[]>();
    for (const node of nodes.values()) {
      const { block } = node;
      if (block.parent) {
        const parent = nodes.get(block.parent);
        if (!parent) {
          this.diagnostics.warning(`Parent "${block.parent}" of block "${block.name}" was not found, skipping it.`);
          continue;
        }
        parent.children.push(node);
      } else if (block.category) {
        const roots = grouped.get(block.category) ?? [];
        roots.push(node);
        grouped.set(block.category, roots);
      } else {
        this.diagnostics.warning(`Block "${block.name}" has no category and no parent, skipping it.`);
      }
    }
    return grouped;
  }
}
