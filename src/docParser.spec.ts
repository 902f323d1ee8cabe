import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { Diagnostics } from './diagnostics.js';
import { DocParser, findSourceFiles } from './docParser.js';
import { PluginHost } from './plugins.js';
import type { ContentBlock, NavLevel, PageMap } from './types.js';

const BUTTONS_SCSS = `/*doc
---
title: Buttons
name: buttons
category: Base CSS
---

Use \`.btn\` for buttons.
*/
.btn { color: red; }

/*doc
---
title: Primary
name: button-primary
parent: buttons
---

The main action.
*/
`;

const TYPE_MD = `---
title: Typography
name: typography
category: Base CSS
---

Text styles.
`;

describe('DocParser', () => {
  let tmp: string;
  let diagnostics: Diagnostics;
  const noPlugins = new PluginHost({}, []);

  beforeEach(() => {
    tmp = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'swatchbook-parser-')));
    diagnostics = new Diagnostics();
    fs.outputFileSync(path.join(tmp, 'buttons.scss'), BUTTONS_SCSS);
    fs.outputFileSync(path.join(tmp, 'type.md'), TYPE_MD);
    fs.outputFileSync(path.join(tmp, 'about.html.ejs'), '<h1><%= file_name %></h1>');
  });

  afterEach(() => {
    fs.removeSync(tmp);
  });

  const parse = (navLevel: NavLevel = 'page', index?: string, plugins = noPlugins) =>
    new DocParser(diagnostics).parse([tmp], index, plugins, { navLevel, customExtensions: [], ignorePaths: [] });

  const markdownPage = (pages: PageMap, name: string) => {
    const page = pages.get(name);
    if (page?.kind !== 'markdown') throw new Error(`${name} is not a markdown page`);
    return page;
  };

  it('groups blocks into one page per category', () => {
    const { pages, categories } = parse();

    expect(Array.from(pages.keys())).toEqual(['about.html', 'base_css.html']);
    expect(Array.from(categories)).toEqual([['Base CSS', 'base_css.html']]);
    expect(markdownPage(pages, 'base_css.html').blocks.map(b => [b.name, b.level])).toEqual([
      ['buttons', 1],
      ['button-primary', 2],
      ['typography', 1]
    ]);
  });

  it('writes each block as an anchored heading and its markdown', () => {
    const { pages } = parse();

    expect(markdownPage(pages, 'base_css.html').markdown).toBe(
      [
        '<h1 id="buttons" class="styleguide">Buttons</h1>',
        'Use `.btn` for buttons.',
        '<h2 id="button-primary" class="styleguide">Primary</h2>',
        'The main action.',
        '<h1 id="typography" class="styleguide">Typography</h1>',
        'Text styles.'
      ].join('\n\n') + '\n'
    );
  });

  it('keeps .html.ejs files as template pages', () => {
    const { pages } = parse();
    expect(pages.get('about.html')).toEqual({ kind: 'template', source: '<h1><%= file_name %></h1>' });
  });

  it('adds section navigation', () => {
    const { pages } = parse('section');
    expect(markdownPage(pages, 'base_css.html').markdown).toMatch(
      /^<ul class="section-nav">\n<li><a href="#buttons">Buttons<\/a><\/li>\n<li><a href="#typography">Typography<\/a><\/li>\n<\/ul>\n\n<h1 id="buttons"/
    );
  });

  it('nests children in full navigation', () => {
    const { pages } = parse('all');
    expect(markdownPage(pages, 'base_css.html').markdown).toContain(
      '<li><a href="#buttons">Buttons</a>\n  <ul>\n  <li><a href="#button-primary">Primary</a></li>\n  </ul>\n</li>'
    );
  });

  it('copies the index category page to index.html', () => {
    const { pages } = parse('page', 'Base CSS');
    expect(pages.get('index.html')).toEqual(pages.get('base_css.html'));
  });

  it('skips blocks it cannot place and says why', () => {
    fs.outputFileSync(
      path.join(tmp, 'broken.js'),
      [
        '/*doc no front matter */',
        '/*doc\n---\ntitle: Orphan\nname: orphan\nparent: nobody\n---\nLost.\n*/',
        '/*doc\n---\ntitle: Loose\nname: loose\n---\nNo category.\n*/',
        '/*doc\n---\ntitle: Nameless\ncategory: Base CSS\n---\nHi.\n*/'
      ].join('\n')
    );
    const file = path.join(tmp, 'broken.js');

    const { pages } = parse();

    expect(diagnostics.warnings()).toEqual([
      `Documentation block in ${file} has no front matter, skipping it.`,
      `Documentation block in ${file} has no name, skipping it.`,
      'Parent "nobody" of block "orphan" was not found, skipping it.',
      'Block "loose" has no category and no parent, skipping it.'
    ]);
    expect(markdownPage(pages, 'base_css.html').blocks.map(b => b.name)).toEqual([
      'buttons',
      'button-primary',
      'typography'
    ]);
  });

  it('keeps extra front matter as block metadata', () => {
    fs.outputFileSync(
      path.join(tmp, 'z.css'),
      '/*doc\n---\ntitle: Grid\nname: grid\ncategory: Layout\nstatus: beta\n---\nColumns.\n*/'
    );
    const { pages } = parse();
    expect(markdownPage(pages, 'layout.html').blocks[0].meta).toEqual({ status: 'beta' });
  });

  it('hands blocks and pages to enabled plugins', () => {
    const seen: string[] = [];
    let finalized: PageMap | undefined;
    const plugins = new PluginHost({ plugins: ['recorder'] }, [], [
      {
        name: 'recorder',
        block: (block: ContentBlock) => seen.push(block.name),
        finalize: pages => {
          finalized = pages;
        }
      },
      { name: 'disabled', block: () => seen.push('never') }
    ]);

    const { pages } = parse('page', undefined, plugins);

    expect(seen).toEqual(['buttons', 'button-primary', 'typography']);
    expect(finalized).toBe(pages);
  });
});

describe('findSourceFiles', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'swatchbook-find-'));
    for (const file of ['a.css', 'b.scss', 'c.vue', 'notes.txt', 'page.html.ejs', 'vendor/d.css', 'node_modules/x/e.css']) {
      fs.outputFileSync(path.join(tmp, file), '');
    }
  });

  afterEach(() => {
    fs.removeSync(tmp);
  });

  it('finds supported files and template pages', () => {
    expect(findSourceFiles(tmp, { customExtensions: [], ignorePaths: [] })).toEqual([
      'a.css',
      'b.scss',
      'page.html.ejs',
      'vendor/d.css'
    ]);
  });

  it('adds custom extensions and honours ignore paths', () => {
    expect(findSourceFiles(tmp, { customExtensions: ['vue'], ignorePaths: ['vendor/**'] })).toEqual([
      'a.css',
      'b.scss',
      'c.vue',
      'page.html.ejs'
    ]);
  });
});
