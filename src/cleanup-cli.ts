/**
 * Shared command surface for the dedupe-merge and flatten-merge tools
 */

import { existsSync } from 'fs';
import { cleanupBookmarkFile } from './bookmark-cleanup.js';
import type { CleanupSummary } from './bookmark-cleanup.js';
import { ConfigManager, resolveConfigPath } from './config.js';
import { AppError, handleError, logger } from './logger.js';
import { isMergeScope } from './types.js';
import type { CleanupMode, MergeScope } from './types.js';

// ============================================================================
// CLI Argument Parsing
// ============================================================================

export interface CliArgs {
  command: 'run' | 'help' | 'print-config';
  inputPath?: string;
  outputPath?: string;
  scope?: MergeScope;
  configPath?: string;
  json: boolean;
  verbose: boolean;
}

export interface CliOutput {
  out(text: string): void;
}

const consoleOutput: CliOutput = {
  out: text => console.log(text),
};

export const TOOL_NAMES: Record<CleanupMode, string> = {
  'dedupe-merge': 'bookmark-dedupe-merge',
  'flatten-merge': 'bookmark-flatten-merge',
};

function usageError(message: string, mode: CleanupMode): AppError {
  return new AppError(
    `${message} (run ${TOOL_NAMES[mode]} --help for usage)`,
    'INVALID_ARGUMENTS'
  );
}

/**
 * Parse argv (without the node and script entries). Throws INVALID_ARGUMENTS.
 */
export function parseArgs(argv: string[], mode: CleanupMode): CliArgs {
  const result: CliArgs = {
    command: 'run',
    json: false,
    verbose: false,
  };

  const takeValue = (flag: string, index: number, inline?: string): string => {
    const value = inline ?? argv[index + 1];
    if (value === undefined || (inline === undefined && value.startsWith('-'))) {
      throw usageError(`Missing value for ${flag}`, mode);
    }
    return value;
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const inline = eq > 0 ? arg.slice(eq + 1) : undefined;
    const consumes = inline === undefined ? 1 : 0;

    if (flag === '--help' || flag === '-h') {
      result.command = 'help';
    } else if (flag === '--print-config') {
      result.command = 'print-config';
    } else if (flag === '--merge-scope') {
      if (mode === 'flatten-merge') {
        throw usageError('--merge-scope is not accepted: flatten-merge always merges globally', mode);
      }
      const value = takeValue(flag, i, inline);
      if (!isMergeScope(value)) {
        throw usageError(`Invalid --merge-scope "${value}": expected sibling or global`, mode);
      }
      result.scope = value;
      i += consumes;
    } else if (flag === '--output' || flag === '-o') {
      result.outputPath = takeValue(flag, i, inline);
      i += consumes;
    } else if (flag === '--config') {
      result.configPath = takeValue(flag, i, inline);
      i += consumes;
    } else if (flag === '--json') {
      result.json = true;
    } else if (flag === '--verbose' || flag === '-v') {
      result.verbose = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw usageError(`Unknown option: ${arg}`, mode);
    } else if (result.inputPath === undefined) {
      result.inputPath = arg;
    } else {
      throw usageError(`Unexpected argument: ${arg}`, mode);
    }

    i++;
  }

  return result;
}

// ============================================================================
// Output
// ============================================================================

export function helpText(mode: CleanupMode): string {
  const tool = TOOL_NAMES[mode];
  const scopeLine = mode === 'dedupe-merge'
    ? '  --merge-scope <scope>   sibling (default) or global\n'
    : '';
  const description = mode === 'dedupe-merge'
    ? 'Merge same-named folders and remove duplicate links from a bookmark export.'
    : 'Merge folders globally, drop all folders, and keep each link once.';
  const suffix = mode === 'dedupe-merge' ? '.dedup' : '.flat';

  return `
${tool} - ${description}

USAGE:
  ${tool} <input.html> [options]

OPTIONS:
${scopeLine}  --output, -o <path>     Output file (default: input name with ${suffix} before the extension)
  --config <path>         Configuration file (YAML or JSON)
  --json                  Print the run summary as JSON
  --verbose, -v           Debug logging, including every duplicate URL
  --print-config          Print the effective configuration and exit
  --help, -h              Show this help message
`;
}

export function formatSummary(summary: CleanupSummary): string {
  const lines = [
    `Wrote ${summary.mode === 'flatten-merge' ? 'flattened' : 'deduplicated'} bookmarks to: ${summary.outputPath}`,
    'Summary:',
    `  Merge scope:      ${summary.scope}`,
    `  Links before:     ${summary.before.links}`,
    `  Links kept:       ${summary.after.links}`,
    `  Links removed:    ${summary.duplicateLinksRemoved}`,
    `  Folders merged:   ${summary.foldersMerged}`,
  ];
  if (summary.mode === 'flatten-merge') {
    lines.push(`  Folders dropped:  ${summary.foldersDiscarded}`);
  } else {
    lines.push(`  Folders kept:     ${summary.after.folders}`);
  }
  return lines.join('\n');
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Run one tool. Returns the process exit code.
 */
export function runCleanupCli(argv: string[], mode: CleanupMode, output: CliOutput = consoleOutput): number {
  try {
    const args = parseArgs(argv, mode);

    if (args.command === 'help') {
      output.out(helpText(mode));
      return 0;
    }

    if (args.configPath !== undefined && !existsSync(args.configPath)) {
      throw new AppError(`Config file not found: ${args.configPath}`, 'INVALID_CONFIG');
    }
    const manager = new ConfigManager(resolveConfigPath(args.configPath));
    const validation = manager.validate();
    if (!validation.valid) {
      throw new AppError(
        `Invalid configuration in ${manager.getPath()}: ${validation.errors.join('; ')}`,
        'INVALID_CONFIG',
        1,
        { errors: validation.errors }
      );
    }

    if (args.command === 'print-config') {
      output.out(manager.toYAML());
      return 0;
    }

    if (args.inputPath === undefined) {
      throw usageError('Missing input file', mode);
    }

    const config = manager.getAll();
    logger.setMinLevel(args.verbose ? 'debug' : args.json ? 'warn' : config.logLevel ?? logger.getMinLevel());

    const summary = cleanupBookmarkFile({
      inputPath: args.inputPath,
      mode,
      scope: args.scope ?? config.merge.scope,
      outputPath: args.outputPath,
      suffixes: config.output,
    });

    output.out(args.json ? JSON.stringify(summary, null, 2) : formatSummary(summary));
    return 0;
  } catch (error) {
    return handleError(error, TOOL_NAMES[mode]).exitCode;
  }
}
