#!/usr/bin/env node

/**
 * CLI Interface
 *
 * Command-line interface for the rendition compiler.
 * Strictly separates site loading from compilation.
 */

import { parseArgs } from 'node:util';
import type { CompilationListener } from './listeners.js';
import { compileSite, formatResult } from './compiler.js';
import { loadSite } from './site.js';
import { createDefaultRegistry } from './filters.js';
import { NotificationCenter } from './events.js';
import { DebugPrinter, FileActionPrinter, TimingRecorder } from './listeners.js';
import { describeError } from './errors.js';

/**
 * CLI commands.
 */
const COMMANDS = ['compile', 'filters', 'help'] as const;
type Command = (typeof COMMANDS)[number];

interface CliOptions {
  output?: string;
  verbose: boolean;
  debug: boolean;
  help: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse command line arguments.
 */
function parseCliArgs(): { command: string; args: string[]; options: CliOptions } {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      output: { type: 'string', short: 'o' },
      verbose: { type: 'boolean' },
      debug: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  return {
    command: positionals[0] ?? 'help',
    args: positionals.slice(1),
    options: {
      output: values.output,
      verbose: values.verbose ?? false,
      debug: values.debug ?? false,
      help: values.help ?? false,
    },
  };
}

/**
 * Print help message.
 */
function printHelp(): void {
  console.log(`
rendition - Item representation compiler

USAGE:
  rendition <command> [options]

COMMANDS:
  compile <site.json>     Compile every representation of a site
  filters                 List available filters
  help                    Show this help message

OPTIONS:
  -o, --output <dir>      Output directory (overrides the site's outputDir)
  --verbose               Show identical files and filter timings
  --debug                 Trace compilation events
  -h, --help              Show help

EXAMPLES:
  rendition compile site.json
  rendition compile site.json -o public --verbose
  rendition filters
`);
}

/**
 * Compile command.
 */
async function runCompile(sitePath: string, options: CliOptions): Promise<number> {
  const loaded = await loadSite(sitePath, options.output);
  if (!loaded.success) {
    console.error(`Failed to load site: ${sitePath}`);
    console.error(describeError(loaded.error));
    return 1;
  }

  const events = new NotificationCenter();
  const listeners: CompilationListener[] = [new FileActionPrinter({ showIdentical: options.verbose })];
  if (options.verbose) listeners.push(new TimingRecorder());
  if (options.debug) listeners.push(new DebugPrinter());
  for (const listener of listeners) listener.start(events);

  const startedAt = performance.now();
  const result = compileSite(loaded.site, { events });
  const seconds = (performance.now() - startedAt) / 1000;

  console.log('');
  for (const listener of listeners) listener.stop();

  if (!result.success) {
    console.error(describeError(result.error));
    console.error(formatResult(result));
    return 1;
  }

  console.log('');
  console.log(formatResult(result));
  console.log('');
  console.log(`Site compiled in ${seconds.toFixed(2)}s.`);
  return 0;
}

/**
 * Filters command.
 */
function runFilters(): number {
  const registry = createDefaultRegistry();
  console.log('Available filters:');
  for (const name of registry.names()) {
    const descriptor = registry.resolve(name);
    if (descriptor === undefined) continue;
    const description = descriptor.description === undefined ? '' : `  ${descriptor.description}`;
    console.log(`  ${name} (${descriptor.from} -> ${descriptor.to})${description}`);
  }
  return 0;
}

/**
 * Main entry point.
 */
async function main(): Promise<number> {
  const { command, args, options } = parseCliArgs();

  if (!isCommand(command)) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (options.help) {
    printHelp();
    return 0;
  }

  switch (command) {
    case 'help':
      printHelp();
      return 0;

    case 'compile': {
      const sitePath = args[0];
      if (sitePath === undefined) {
        console.error('Missing site file');
        printHelp();
        return 1;
      }
      return runCompile(sitePath, options);
    }

    case 'filters':
      return runFilters();
  }
}

// Run
main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
