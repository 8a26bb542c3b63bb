import { Command } from 'commander';
import chalk from 'chalk';
import { ok, err, type Result } from 'neverthrow';
import {
  createRuntime,
  findProjectRoot,
  isModeHint,
  MODE_HINTS,
  type ModeHint,
  type SearchOptions,
  type SearchResult,
} from '@sift/core';

export interface SearchCommandOptions {
  mode: string;
  minScore?: string;
  maxResults?: string;
  caseSensitive?: boolean;
  wholeWords?: boolean;
  context?: string;
  include?: string[];
  exclude?: string[];
  json?: boolean;
  verbose?: boolean;
}

export interface ParsedSearchArgs {
  mode: ModeHint;
  options: Partial<SearchOptions>;
}

function highlight(result: SearchResult): string {
  const { content, startChar, endChar } = result;
  if (endChar <= startChar) {
    return content;
  }
  return (
    content.slice(0, startChar) +
    chalk.bold.yellow(content.slice(startChar, endChar)) +
    content.slice(endChar)
  );
}

/**
 * Format a single search result for terminal display.
 */
export function formatSearchResult(result: SearchResult, index: number): string {
  const lines: string[] = [];
  const rank = chalk.dim(`[${index + 1}]`);
  const score = chalk.green(result.score.toFixed(4));
  const location = chalk.cyan(`${result.filePath}:${result.lineNumber}`);
  const matchType = chalk.magenta(`(${result.matchType})`);

  lines.push(`${rank} ${score} ${location} ${matchType}`);
  for (const line of result.contextBefore ?? []) {
    lines.push(`    ${chalk.dim(line)}`);
  }
  lines.push(`    ${highlight(result)}`);
  for (const line of result.contextAfter ?? []) {
    lines.push(`    ${chalk.dim(line)}`);
  }

  return lines.join('\n');
}

/**
 * Validates the raw commander options. Only options the user actually gave
 * appear in the result, so config defaults still apply to the rest.
 */
export function parseSearchArgs(raw: SearchCommandOptions): Result<ParsedSearchArgs, string> {
  const mode = raw.mode;
  if (!isModeHint(mode)) {
    return err(`Invalid --mode value "${mode}". Expected one of: ${MODE_HINTS.join(', ')}.`);
  }

  const options: Partial<SearchOptions> = {};

  if (raw.minScore !== undefined) {
    const minScore = Number(raw.minScore);
    if (raw.minScore.trim() === '' || isNaN(minScore) || minScore < 0 || minScore > 1) {
      return err('Invalid --min-score value. Must be a number between 0 and 1.');
    }
    options.minScore = minScore;
  }

  if (raw.maxResults !== undefined) {
    const maxResults = parseInt(raw.maxResults, 10);
    if (isNaN(maxResults) || maxResults < 1) {
      return err('Invalid --max-results value. Must be a positive integer.');
    }
    options.maxResults = maxResults;
  }

  if (raw.context !== undefined) {
    const contextLines = parseInt(raw.context, 10);
    if (isNaN(contextLines) || contextLines < 0) {
      return err('Invalid --context value. Must be a non-negative integer.');
    }
    options.includeContext = true;
    options.contextLines = contextLines;
  }

  if (raw.caseSensitive) {
    options.caseSensitive = true;
  }
  if (raw.wholeWords) {
    options.wholeWords = true;
  }
  if (raw.include && raw.include.length > 0) {
    options.include = raw.include;
  }
  if (raw.exclude && raw.exclude.length > 0) {
    options.exclude = raw.exclude;
  }

  return ok({ mode, options });
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search', { isDefault: true })
    .description('Search files under a path')
    .argument('<query>', 'Search query')
    .argument('[path]', 'File or directory to search', '.')
    .option('-m, --mode <mode>', `Search mode (${MODE_HINTS.join('|')})`, 'auto')
    .option('--min-score <n>', 'Minimum score between 0 and 1')
    .option('-n, --max-results <n>', 'Maximum number of results')
    .option('-s, --case-sensitive', 'Match case exactly')
    .option('-w, --whole-words', 'Match whole words only')
    .option('-C, --context <n>', 'Show n lines of context around each match')
    .option('--include <glob...>', 'Only search files matching these globs')
    .option('--exclude <glob...>', 'Skip files matching these globs')
    .option('--json', 'Output results as JSON')
    .option('-v, --verbose', 'Log the search plan and fallbacks to stderr')
    .action(async (query: string, path: string, options: SearchCommandOptions) => {
      const parsed = parseSearchArgs(options);
      if (parsed.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red(parsed.error));
        process.exit(1);
      }
      const { mode, options: searchOptions } = parsed.value;

      const runtimeResult = await createRuntime({
        rootDir: await findProjectRoot(path),
        logLevel: options.verbose ? 'debug' : undefined,
      });
      if (runtimeResult.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red('Search failed:'), runtimeResult.error.message);
        process.exit(1);
      }
      const runtime = runtimeResult.value;

      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort(new Error('Interrupted'));
      process.once('SIGINT', onInterrupt);

      const searchResult = await runtime.engine
        .search(query, path, { ...runtime.defaultSearchOptions, ...searchOptions, signal: controller.signal }, mode)
        .finally(() => process.off('SIGINT', onInterrupt));

      if (searchResult.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red('Search failed:'), searchResult.error.message);
        process.exit(1);
      }
      const results = searchResult.value;

      if (options.json) {
        // eslint-disable-next-line no-console
        console.log(JSON.stringify(results, null, 2));
        return;
      }

      if (results.length === 0) {
        // eslint-disable-next-line no-console
        console.log(chalk.yellow('No results found.'));
        return;
      }

      // eslint-disable-next-line no-console
      console.log(chalk.bold(`Found ${results.length} result(s) for "${query}":\n`));
      results.forEach((result, i) => {
        // eslint-disable-next-line no-console
        console.log(formatSearchResult(result, i));
      });
    });
}
