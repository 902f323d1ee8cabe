import type { ComponentLinker, LinkTarget, PageMap } from './types.js';

/**
 * Maps component names to the page and anchor that document them. The
 * first page to claim a name keeps it.
 */
export class LinkResolver implements ComponentLinker {
  private readonly links = new Map<string, string>();

  constructor(targets: LinkTarget[]) {
    for (const target of targets) {
      for (const component of target.componentNames) {
        if (!this.links.has(component)) {
          this.links.set(component, `${target.name}#${component}`);
        }
      }
    }
  }

  resolve(componentName: string): string | undefined {
    return this.links.get(componentName);
  }

  static fromPages(pages: PageMap): LinkResolver {
    return new LinkResolver(
      Array.from(pages, ([name, page]) => ({
        name,
        componentNames: page.kind === 'markdown' ? page.blocks.map(block => block.name) : []
      }))
    );
  }
}
