import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from './errors.js';
import { compileTemplate } from './templateLoader.js';
import type { PageTemplate } from './templateLoader.js';
import type { CodeExampleLookup, CodeExampleRenderer } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const BUILTIN_TEMPLATES_DIR = path.resolve(__dirname, '../templates/code_examples');

const TEMPLATE_SUFFIX = '.html.ejs';

// How the live part of an example is produced from its source
export type ExampleOutput = 'html' | 'script' | 'babel';

export interface RendererDefinition {
  name: string;
  output: ExampleOutput;
  exampleTemplate: string;
  tableTemplate: string;
}

const builtinRenderers: RendererDefinition[] = [
  { name: 'html', output: 'html', exampleTemplate: 'markdown_example_template', tableTemplate: 'markdown_table_template' },
  { name: 'js', output: 'script', exampleTemplate: 'js_example_template', tableTemplate: 'markdown_table_template' },
  { name: 'jsx', output: 'babel', exampleTemplate: 'jsx_example_template', tableTemplate: 'markdown_table_template' }
];

function renderOutput(output: ExampleOutput, code: string): string {
  switch (output) {
    case 'html':
      return code;
    case 'script':
      return `<script>${code}</script>`;
    case 'babel':
      return `<script type="text/babel">${code}</script>`;
  }
}

/**
 * Compile every *.html.ejs template in dir, keyed by name without suffix
 */
function loadTemplates(dir: string): Map<string, PageTemplate> {
  const templates = new Map<string, PageTemplate>();
  for (const file of fs.readdirSync(dir).sort()) {
    if (!file.endsWith(TEMPLATE_SUFFIX)) continue;
    const fullPath = path.join(dir, file);
    templates.set(file.slice(0, -TEMPLATE_SUFFIX.length), compileTemplate(fs.readFileSync(fullPath, 'utf-8'), fullPath));
  }
  return templates;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isExampleOutput(value: unknown): value is ExampleOutput {
  return value === 'html' || value === 'script' || value === 'babel';
}

function optionalName(value: unknown, fallback: string, file: string, key: string): string {
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigurationError(`Invalid "${key}" in code example renderer ${file}`);
  }
  return value;
}

/**
 * Parse a custom renderer definition file:
 * { "name": "vue", "output": "html", "example_template": "...", "table_template": "..." }
 */
export function parseRendererDefinition(content: string, file: string): RendererDefinition {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Could not parse code example renderer ${file}`, { cause: error });
  }

  if (!isRecord(data)) {
    throw new ConfigurationError(`Code example renderer ${file} must be a JSON object`);
  }

  const { name, output } = data;
  if (typeof name !== 'string' || name === '') {
    throw new ConfigurationError(`Code example renderer ${file} has no name`);
  }
  const resolvedOutput = output ?? 'html';
  if (!isExampleOutput(resolvedOutput)) {
    throw new ConfigurationError(`Code example renderer ${file} has an unknown output "${String(output)}"`);
  }

  return {
    name,
    output: resolvedOutput,
    exampleTemplate: optionalName(data.example_template, 'markdown_example_template', file, 'example_template'),
    tableTemplate: optionalName(data.table_template, 'markdown_table_template', file, 'table_template')
  };
}

function loadRendererDefinitions(dir: string): RendererDefinition[] {
  return fs
    .readdirSync(dir)
    .filter(file => file.endsWith('.json'))
    .sort()
    .map(file => {
      const fullPath = path.join(dir, file);
      return parseRendererDefinition(fs.readFileSync(fullPath, 'utf-8'), fullPath);
    });
}

export interface CodeExampleOptions {
  templatesDir?: string;
  renderersDir?: string;
}

/**
 * Renderers for `<name>_example` and `<name>_example_table` code fences
 */
export class CodeExamples implements CodeExampleLookup {
  private readonly renderers = new Map<string, CodeExampleRenderer>();

  constructor(definitions: RendererDefinition[], templates: Map<string, PageTemplate>) {
    for (const definition of definitions) {
      const example = templates.get(definition.exampleTemplate);
      const table = templates.get(definition.tableTemplate);
      if (!example || !table) {
        const missing = example ? definition.tableTemplate : definition.exampleTemplate;
        throw new ConfigurationError(`Code example renderer "${definition.name}" uses unknown template "${missing}"`);
      }

      this.renderers.set(definition.name, {
        name: definition.name,
        renderExample: code =>
          example({ rendered_example: renderOutput(definition.output, code), code_example: code }),
        renderTable: codes =>
          table({
            examples: codes.map(code => ({
              rendered_example: renderOutput(definition.output, code),
              code_example: code
            }))
          })
      });
    }
  }

  get(name: string): CodeExampleRenderer | undefined {
    return this.renderers.get(name);
  }

  names(): string[] {
    return Array.from(this.renderers.keys());
  }
}

/**
 * Built-in renderers and templates, overridden by the project's own
 */
export function loadCodeExamples(options: CodeExampleOptions = {}): CodeExamples {
  const templates = loadTemplates(BUILTIN_TEMPLATES_DIR);
  if (options.templatesDir) {
    for (const [name, template] of loadTemplates(options.templatesDir)) {
      templates.set(name, template);
    }
  }

  const definitions = [...builtinRenderers];
  if (options.renderersDir) {
    for (const definition of loadRendererDefinitions(options.renderersDir)) {
      const existing = definitions.findIndex(d => d.name === definition.name);
      if (existing >= 0) {
        definitions[existing] = definition;
      } else {
        definitions.push(definition);
      }
    }
  }

  return new CodeExamples(definitions, templates);
}
