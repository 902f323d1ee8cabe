import type { ContentBlock, PageMap, Plugin, PluginContext, RawConfig } from './types.js';

/**
 * Runs the enabled plugins. A plugin is enabled by passing `--<name>` on
 * the command line or listing its name under `plugins` in the config.
 */
export class PluginHost implements PluginContext {
  readonly enabled: Plugin[];

  constructor(config: Readonly<RawConfig>, args: readonly string[], plugins: readonly Plugin[] = []) {
    const configured = new Set(Array.isArray(config.plugins) ? config.plugins : []);
    this.enabled = plugins.filter(plugin => configured.has(plugin.name) || args.includes(`--${plugin.name}`));
  }

  block(block: ContentBlock, file: string): void {
    for (const plugin of this.enabled) {
      plugin.block?.(block, file);
    }
  }

  finalize(pages: PageMap): void {
    for (const plugin of this.enabled) {
      plugin.finalize?.(pages);
    }
  }
}
