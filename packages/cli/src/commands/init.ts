import { Command } from 'commander';
import chalk from 'chalk';
import { access, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { stringify } from 'yaml';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from '@sift/core';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes `.sift.yaml` with every default spelled out. Refuses to replace an
 * existing file unless `force` is set.
 */
export async function writeDefaultConfig(rootDir: string, force = false): Promise<Result<string, string>> {
  const configPath = join(rootDir, CONFIG_FILE_NAME);
  if (!force && (await exists(configPath))) {
    return err(`${CONFIG_FILE_NAME} already exists.`);
  }

  await writeFile(configPath, stringify(DEFAULT_CONFIG), 'utf-8');
  return ok(configPath);
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a default .sift.yaml')
    .argument('[path]', 'Project root', '.')
    .option('--force', 'Overwrite existing configuration file')
    .action(async (path: string, options: { force?: boolean }) => {
      try {
        const result = await writeDefaultConfig(resolve(path), options.force);
        if (result.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red(result.error), 'Use --force to overwrite.');
          process.exit(1);
        }
        // eslint-disable-next-line no-console
        console.log(chalk.green('Created'), result.value);
        // eslint-disable-next-line no-console
        console.log(chalk.dim('Run "sift index" to build the TF-IDF index.'));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Init failed:'), message);
        process.exit(1);
      }
    });
}
