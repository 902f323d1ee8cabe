import matter from 'gray-matter';
import type { Diagnostics } from './diagnostics.js';

const DOC_COMMENT = /\/\*doc([\s\S]*?)\*\//g;

/**
 * Front matter keys a documentation block understands. Anything else is
 * kept as metadata for templates and plugins.
 */
export interface BlockFrontmatter {
  title?: string;
  name?: string;
  category?: string;
  parent?: string;
  [key: string]: unknown;
}

export interface DocumentationBlock {
  name: string;
  title: string;
  category?: string;
  parent?: string;
  markdown: string;
  meta: Record<string, unknown>;
  file: string;
}

/**
 * Pull the text of every doc comment out of a source file
 */
export function extractComments(content: string): string[] {
  return Array.from(content.matchAll(DOC_COMMENT), match => match[1]);
}

/**
 * Extract frontmatter from block content
 */
export function extractFrontmatter(content: string): { frontmatter: BlockFrontmatter; content: string } | undefined {
  const trimmed = content.replace(/^\s*\n/, '').trimStart();
  if (!trimmed.startsWith('---')) return undefined;

  const { data, content: body } = matter(trimmed);
  return {
    frontmatter: data,
    content: body
  };
}

function stringField(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Turn the text of one doc comment (or a whole markdown file) into a
 * block. Blocks without front matter or a name are skipped with a warning.
 */
export function parseBlock(text: string, file: string, diagnostics: Diagnostics): DocumentationBlock | undefined {
  let extracted: ReturnType<typeof extractFrontmatter>;
  try {
    extracted = extractFrontmatter(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    diagnostics.warning(`Could not parse the front matter of a documentation block in ${file}: ${reason}`);
    return undefined;
  }

  if (!extracted) {
    diagnostics.warning(`Documentation block in ${file} has no front matter, skipping it.`);
    return undefined;
  }

  const { frontmatter, content } = extracted;
  const name = stringField(frontmatter.name);
  if (!name) {
    diagnostics.warning(`Documentation block in ${file} has no name, skipping it.`);
    return undefined;
  }

  const { name: _name, title, category, parent, ...meta } = frontmatter;
  return {
    name,
    title: stringField(title) ?? name,
    category: stringField(category),
    parent: stringField(parent),
    markdown: content.trim(),
    meta,
    file
  };
}
