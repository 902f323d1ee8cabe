#!/usr/bin/env node
import fs from 'fs-extra';
import path from 'path';
import { fileURLToPath } from 'url';
import { DocBuilder } from './builder.js';
import { CONFIG_FILE_NAME } from './config.js';
import { Diagnostics, consoleReporter } from './diagnostics.js';
import { setupDir } from './init.js';

export interface CliOptions {
  command: 'build' | 'init' | 'help';
  configFile: string;
  extraArgs: string[];
}

const USAGE = `Usage: swatchbook [init] [-c|--config <file>] [--<plugin> ...]

  init                 create ${CONFIG_FILE_NAME} and starter assets here
  -c, --config <file>  config file to build from (default: ${CONFIG_FILE_NAME})
  -h, --help           show this message

Any other --flag is passed to plugins.`;

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { command: 'build', configFile: CONFIG_FILE_NAME, extraArgs: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case 'init':
        options.command = 'init';
        break;
      case '-h':
      case '--help':
        options.command = 'help';
        break;
      case '-c':
      case '--config': {
        const value = argv[++i];
        if (!value) {
          throw new Error(`${arg} requires a file name`);
        }
        options.configFile = value;
        break;
      }
      default:
        options.extraArgs.push(arg);
    }
  }

  return options;
}

export function main(argv: readonly string[] = process.argv.slice(2), cwd: string = process.cwd()): number {
  const diagnostics = new Diagnostics({ reporter: consoleReporter });

  try {
    const options = parseArgs(argv);
    switch (options.command) {
      case 'help':
        console.log(USAGE);
        return 0;
      case 'init':
        setupDir(cwd, diagnostics);
        return 0;
      case 'build': {
        const builder = DocBuilder.fromConfigFile(path.resolve(cwd, options.configFile), {
          diagnostics,
          args: options.extraArgs
        });
        return builder.build() ? 0 : 1;
      }
    }
  } catch (error) {
    diagnostics.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (process.argv[1] && fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exitCode = main();
}
