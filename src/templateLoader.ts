import ejs from 'ejs';
import type { TemplateFunction } from 'ejs';
import fs from 'fs-extra';
import path from 'path';
import { TemplateError } from './errors.js';
import type { Diagnostics } from './diagnostics.js';

export type TemplateData = Record<string, unknown>;

export type PageTemplate = (data: TemplateData) => string;

export interface HeaderFooter {
  header?: PageTemplate;
  footer?: PageTemplate;
}

/**
 * Compile an EJS template once. Compile and render failures both surface
 * as TemplateError naming the template.
 */
export function compileTemplate(source: string, filename: string): PageTemplate {
  let render: TemplateFunction;
  try {
    render = ejs.compile(source, { filename });
  } catch (error) {
    throw new TemplateError(`Could not compile template ${filename}: ${describe(error)}`, { cause: error });
  }

  return data => {
    try {
      return render(data);
    } catch (error) {
      throw new TemplateError(`Could not render template ${filename}: ${describe(error)}`, { cause: error });
    }
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load the first of names that exists in dir
 */
function loadFirst(dir: string | undefined, names: string[]): PageTemplate | undefined {
  if (!dir) return undefined;
  for (const name of names) {
    const file = path.join(dir, name);
    if (fs.existsSync(file)) {
      return compileTemplate(fs.readFileSync(file, 'utf-8'), file);
    }
  }
  return undefined;
}

export function loadHeaderFooter(docAssetsDir: string | undefined, diagnostics: Diagnostics): HeaderFooter {
  const header = loadFirst(docAssetsDir, ['_header.html', 'header.html']);
  if (!header) {
    diagnostics.warning(
      'No _header.html found in documentation assets. Without this your css/header will not be included on the generated pages.'
    );
  }

  const footer = loadFirst(docAssetsDir, ['_footer.html', 'footer.html']);
  if (!footer) {
    diagnostics.warning('No _footer.html found in documentation assets. This might be okay to ignore...');
  }

  return { header, footer };
}
