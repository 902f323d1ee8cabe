import { unified } from 'unified';
import type { Plugin } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkRehype from 'remark-rehype';
import rehypeStringify from 'rehype-stringify';
import { visit } from 'unist-util-visit';
import GithubSlugger from 'github-slugger';
import type { Root, Text, Heading, Code, Nodes, Parent, PhrasingContent } from 'mdast';
import type {
  CodeExampleLookup,
  ComponentLinker,
  MarkdownRenderer,
  MarkdownRendererFactory,
  MarkdownRendererOptions
} from './types.js';

const COMPONENT_LINK = /\[\[([^\]|]+?)(?:\|([^\]]+?))?\]\]/g;
const EXAMPLE_LANGUAGE = /^(\w+?)_example(_table)?$/;

/**
 * Extract plain text from a node and its children
 */
export function extractText(node: Nodes): string {
  if (node.type === 'text' || node.type === 'inlineCode') {
    return node.value;
  }

  let text = '';
  if ('children' in node) {
    for (const child of node.children) {
      text += extractText(child);
    }
  }
  return text;
}

/**
 * Split a text value around [[component]] and [[label|component]]
 * references. Unknown components stay as literal text. Inside a GFM
 * table cell the labelled form needs its pipe escaped: [[label\|name]].
 */
export function linkComponents(value: string, linker: ComponentLinker): PhrasingContent[] {
  const nodes: PhrasingContent[] = [];
  let last = 0;

  for (const match of value.matchAll(COMPONENT_LINK)) {
    const component = (match[2] ?? match[1]).trim();
    const label = match[2] === undefined ? component : match[1].trim();
    const url = linker.resolve(component);
    if (!url) continue;

    const start = match.index ?? 0;
    if (start > last) {
      nodes.push({ type: 'text', value: value.slice(last, start) });
    }
    nodes.push({ type: 'link', url, children: [{ type: 'text', value: label }] });
    last = start + match[0].length;
  }

  if (last === 0) return [{ type: 'text', value }];
  if (last < value.length) {
    nodes.push({ type: 'text', value: value.slice(last) });
  }
  return nodes;
}

export const remarkComponentLinks: Plugin<[ComponentLinker], Root> = function (linker) {
  return tree => {
    visit(tree, 'text', (node: Text, index: number | undefined, parent: Parent | undefined) => {
      if (!parent || index === undefined || parent.type === 'link') return;

      const replacement = linkComponents(node.value, linker);
      if (replacement.length === 1 && replacement[0].type === 'text') return;

      parent.children.splice(index, 1, ...replacement);
      // continue after the inserted nodes
      return index + replacement.length;
    });
  };
};

export const remarkHeadingIds: Plugin<[], Root> = function () {
  return tree => {
    const slugger = new GithubSlugger();
    visit(tree, 'heading', (node: Heading) => {
      const text = extractText(node);
      if (!text) return;
      node.data = {
        ...node.data,
        hProperties: { ...node.data?.hProperties, id: slugger.slug(text) }
      };
    });
  };
};

export const remarkCodeExamples: Plugin<[CodeExampleLookup], Root> = function (codeExamples) {
  return tree => {
    visit(tree, 'code', (node: Code, index: number | undefined, parent: Parent | undefined) => {
      if (!parent || index === undefined || !node.lang) return;

      const match = EXAMPLE_LANGUAGE.exec(node.lang);
      const renderer = match ? codeExamples.get(match[1]) : undefined;
      if (!match || !renderer) return;

      const value = match[2]
        ? renderer.renderTable(node.value.split(/\n\s*\n/).filter(code => code.trim() !== ''))
        : renderer.renderExample(node.value);
      parent.children[index] = { type: 'html', value };
    });
  };
};

/**
 * GFM (tables, fenced code), component links, heading anchors and code
 * examples. Raw HTML in the markdown is passed through.
 */
export function createHtmlRenderer(options: MarkdownRendererOptions): MarkdownRenderer {
  const processor = unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkComponentLinks, options.linkResolver)
    .use(remarkHeadingIds)
    .use(remarkCodeExamples, options.codeExamples)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypeStringify, { allowDangerousHtml: true });

  return {
    render: markdown => String(processor.processSync(markdown))
  };
}

/**
 * Same as the default renderer, without code example rendering
 */
export function createGfmRenderer(options: MarkdownRendererOptions): MarkdownRenderer {
  const processor = unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkComponentLinks, options.linkResolver)
    .use(remarkHeadingIds)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypeStringify, { allowDangerousHtml: true });

  return {
    render: markdown => String(processor.processSync(markdown))
  };
}

const markdownRenderers = new Map<string, MarkdownRendererFactory>([
  ['default', createHtmlRenderer],
  ['gfm', createGfmRenderer]
]);

export function registerMarkdownRenderer(name: string, factory: MarkdownRendererFactory): void {
  markdownRenderers.set(name, factory);
}

export function getMarkdownRenderer(name: string): MarkdownRendererFactory | undefined {
  return markdownRenderers.get(name);
}
