import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import {
  createRuntime,
  capabilityTier,
  capabilityRecommendations,
  type CapabilityDetails,
  type CapabilityTier,
  type NeuralCapability,
  type ProjectType,
  type SiftRuntime,
} from '@sift/core';

/**
 * What the host can run and which indexes exist for a project.
 */
export interface StatusInfo {
  capability: NeuralCapability;
  details: CapabilityDetails;
  tier: CapabilityTier;
  indexes: {
    termIndex: boolean;
    embeddingIndex: boolean;
  };
  embeddingModel: string;
  storagePath: string;
  projectType: ProjectType;
  recommendations: string[];
}

export function collectStatus(runtime: SiftRuntime): StatusInfo {
  const details = runtime.engine.capabilityDetails();
  const { availability } = runtime.engine.environment();
  return {
    capability: runtime.capability,
    details,
    tier: capabilityTier(details),
    indexes: { ...availability },
    embeddingModel: runtime.config.embedding.model,
    storagePath: runtime.storagePath,
    projectType: runtime.projectType,
    recommendations: capabilityRecommendations(details),
  };
}

function yesNo(value: boolean, yes: string, no: string): string {
  return value ? chalk.green(yes) : chalk.yellow(no);
}

/**
 * Format status info for human-readable terminal output.
 */
export function formatStatus(status: StatusInfo): string {
  const lines: string[] = [];
  const { capability, details } = status;

  lines.push(chalk.bold('sift Status'));
  lines.push('');

  const neural =
    capability.status === 'available'
      ? chalk.green('available')
      : `${chalk.red(capability.status)} ${chalk.dim(`(${capability.reason})`)}`;
  const tierColor = status.tier === 'full' ? chalk.green : status.tier === 'tfidf' ? chalk.yellow : chalk.red;

  lines.push(`  Neural:        ${neural}`);
  lines.push(`  Tier:          ${tierColor(status.tier)}`);
  lines.push(`  Runtime:       ${yesNo(details.runtimeAvailable, 'found', 'missing')}`);
  lines.push(`  Model:         ${yesNo(details.modelAvailable, 'found', 'missing')}`);
  lines.push(
    `  Memory:        ${chalk.cyan(`${details.memoryInfo.totalMb} MB total, ${details.memoryInfo.freeMb} MB free`)}`,
  );
  lines.push(`  CPUs:          ${chalk.cyan(String(details.cpuCount))}`);
  lines.push(`  TF-IDF index:  ${yesNo(status.indexes.termIndex, 'present', 'missing')}`);
  lines.push(`  Embeddings:    ${yesNo(status.indexes.embeddingIndex, 'present', 'missing')}`);
  lines.push(`  Embed model:   ${chalk.cyan(status.embeddingModel)}`);
  lines.push(`  Storage:       ${chalk.dim(status.storagePath)}`);
  lines.push(`  Project:       ${chalk.cyan(status.projectType)}`);

  if (status.recommendations.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Recommendations:'));
    for (const recommendation of status.recommendations) {
      lines.push(`  ${chalk.gray('→')} ${recommendation}`);
    }
  }

  return lines.join('\n');
}

/**
 * Format status info as JSON.
 */
export function formatStatusJSON(status: StatusInfo): string {
  return JSON.stringify(status, null, 2);
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .alias('doctor')
    .description('Show search capabilities, index presence and recommendations')
    .argument('[path]', 'Project root', '.')
    .option('--json', 'Output in JSON format')
    .action(async (path: string, options: { json?: boolean }) => {
      const runtimeResult = await createRuntime({ rootDir: resolve(path) });
      if (runtimeResult.isErr()) {
        // eslint-disable-next-line no-console
        console.error(chalk.red('Status check failed:'), runtimeResult.error.message);
        process.exit(1);
      }

      const status = collectStatus(runtimeResult.value);
      // eslint-disable-next-line no-console
      console.log(options.json ? formatStatusJSON(status) : formatStatus(status));
    });
}
