/**
 * resolve command: print the effective partition order and every overlay's
 * resolved configuration.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_SETTINGS_PATH } from '../../core/config/loader.js';
import { logger as log } from '../../utils/logger.js';
import { configurationToJson, loadOverlayConfig, type CommonOptions } from './shared.js';

/**
 * Create the resolve command.
 */
export function createResolveCommand(): Command {
  return new Command('resolve')
    .description('Resolve overlay configuration for every partition under a root directory')
    .argument('<root>', 'Directory containing the partitions')
    .option('-c, --config <path>', 'Path to settings file', DEFAULT_SETTINGS_PATH)
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Log skipped files and packages')
    .action(async (root: string, options: CommonOptions) => {
      try {
        await runResolve(root, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runResolve(root: string, options: CommonOptions): Promise<void> {
  const overlayConfig = await loadOverlayConfig(root, options);
  const names = overlayConfig.getSortedOverlays();

  if (options.json) {
    const configurations = names.flatMap((name) => {
      const configuration = overlayConfig.getConfiguration(name);
      return configuration ? [configurationToJson(configuration)] : [];
    });
    console.log(JSON.stringify({
      partition_order: overlayConfig.getPartitionOrder(),
      order_overridden: overlayConfig.isPartitionOrderOverridden(),
      configurations,
    }, null, 2));
    return;
  }

  console.log(chalk.bold(`Partition order: ${overlayConfig.getPartitionOrder()}`));
  if (names.length === 0) {
    console.log(chalk.dim('No overlay packages found'));
    return;
  }

  for (const name of names) {
    const configuration = overlayConfig.getConfiguration(name);
    if (!configuration) continue;
    const state = configuration.enabled ? chalk.green('enabled') : chalk.red('disabled');
    const mutability = configuration.mutable ? 'mutable' : 'immutable';
    console.log(
      `  [${configuration.configIndex}] ${chalk.cyan(configuration.packageName)} ` +
      `${state} ${mutability} ${chalk.dim(`(${configuration.partition}, ${configuration.origin})`)}`
    );
  }
}
