import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { relative, resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  capabilityRecommendations,
  createRuntime,
  createIgnoreFilter,
  FileScanner,
  TermIndex,
  EmbeddingIndex,
  saveTermIndex,
  saveEmbeddingIndex,
  type SearchError,
  type SiftRuntime,
} from '@sift/core';

export interface IndexSummary {
  filesIndexed: number;
  linesIndexed: number;
  termIndexPath: string;
  /** Set only when embeddings were built. */
  embeddingIndexPath?: string;
}

export interface BuildIndexesOptions {
  semantic?: boolean;
  signal?: AbortSignal;
  onProgress?: (message: string) => void;
}

/**
 * Scans the project root, writes the TF-IDF index and, when `semantic` is
 * set, embeds every indexed line and writes the embedding index.
 */
export async function buildIndexes(
  runtime: SiftRuntime,
  options: BuildIndexesOptions = {},
): Promise<Result<IndexSummary, SearchError>> {
  const { rootDir, storagePath, logger } = runtime;
  const progress = options.onProgress ?? (() => undefined);

  progress('Scanning files...');
  const storageDir = relative(rootDir, storagePath);
  const filter = createIgnoreFilter(rootDir, [...runtime.excludePatterns, storageDir]);
  if (filter.isErr()) {
    return err(filter.error);
  }
  const scanner = new FileScanner(rootDir, filter.value);
  const scanResult = await scanner.listFiles({ signal: options.signal });
  if (scanResult.isErr()) {
    return err(scanResult.error);
  }
  const files = scanResult.value;

  progress(`Indexing ${files.length} files...`);
  const termResult = await TermIndex.build(rootDir, files, { signal: options.signal, logger });
  if (termResult.isErr()) {
    return err(termResult.error);
  }
  const termIndex = termResult.value;
  const termIndexPath = await saveTermIndex(storagePath, termIndex);
  logger.info('TF-IDF index written', { path: termIndexPath, documents: termIndex.size });

  const summary: IndexSummary = {
    filesIndexed: files.length,
    linesIndexed: termIndex.size,
    termIndexPath,
  };
  if (!options.semantic) {
    return ok(summary);
  }

  const provider = runtime.embeddingProvider;
  progress(`Embedding ${termIndex.size} lines with ${provider.model}...`);
  const embeddingResult = await EmbeddingIndex.build(
    termIndex.documents().map(({ filePath, lineNumber, content }) => ({ filePath, lineNumber, content })),
    provider,
    {
      signal: options.signal,
      onProgress: (embedded, total) => progress(`Embedded ${embedded}/${total} lines...`),
    },
  );
  if (embeddingResult.isErr()) {
    return err(embeddingResult.error);
  }
  const embeddingIndexPath = await saveEmbeddingIndex(storagePath, embeddingResult.value);
  logger.info('Embedding index written', { path: embeddingIndexPath, entries: embeddingResult.value.size });

  return ok({ ...summary, embeddingIndexPath });
}

/**
 * Lines printed after an embedding build when semantic search still cannot
 * run: the first failing check, then every remedy.
 */
export function semanticFollowUp(runtime: SiftRuntime): string[] {
  if (runtime.capability.status === 'available') {
    return [];
  }
  return [
    `Semantic search stays off: ${runtime.capability.reason}`,
    ...capabilityRecommendations(runtime.engine.capabilityDetails()).map((remedy) => `  → ${remedy}`),
  ];
}

export function registerIndexCommand(program: Command): void {
  program
    .command('index')
    .description('Build the TF-IDF index, and optionally the embedding index')
    .argument('[path]', 'Project root', '.')
    .option('--semantic', 'Also build the embedding index through Ollama')
    .option('-v, --verbose', 'Log indexing details to stderr')
    .action(async (path: string, options: { semantic?: boolean; verbose?: boolean }) => {
      const startTime = Date.now();
      const runtimeResult = await createRuntime({
        rootDir: resolve(path),
        logLevel: options.verbose ? 'debug' : undefined,
      });
      if (runtimeResult.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red('Error:'), runtimeResult.error.message);
        process.exit(1);
      }
      const runtime = runtimeResult.value;

      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort(new Error('Interrupted'));
      process.once('SIGINT', onInterrupt);

      const spinner = ora('Starting...').start();
      const result = await buildIndexes(runtime, {
        semantic: options.semantic,
        signal: controller.signal,
        onProgress: (message) => {
          spinner.text = message;
        },
      }).finally(() => process.off('SIGINT', onInterrupt));

      if (result.isErr()) {
        spinner.fail('Indexing failed');
        // eslint-disable-next-line no-console
        console.error(chalk.red('Error:'), result.error.message);
        process.exit(1);
      }

      const summary = result.value;
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      spinner.succeed('Indexing complete!');

      // eslint-disable-next-line no-console
      console.log('');
      // eslint-disable-next-line no-console
      console.log(chalk.bold('Summary:'));
      // eslint-disable-next-line no-console
      console.log(`  Files indexed:   ${chalk.cyan(String(summary.filesIndexed))}`);
      // eslint-disable-next-line no-console
      console.log(`  Lines indexed:   ${chalk.cyan(String(summary.linesIndexed))}`);
      // eslint-disable-next-line no-console
      console.log(`  TF-IDF index:    ${chalk.dim(summary.termIndexPath)}`);
      if (summary.embeddingIndexPath !== undefined) {
        // eslint-disable-next-line no-console
        console.log(`  Embeddings:      ${chalk.dim(summary.embeddingIndexPath)}`);
        for (const line of semanticFollowUp(runtime)) {
          // eslint-disable-next-line no-console
          console.log(chalk.yellow(`  ${line}`));
        }
      }
      // eslint-disable-next-line no-console
      console.log(`  Time elapsed:    ${chalk.cyan(elapsed + 's')}`);
    });
}
