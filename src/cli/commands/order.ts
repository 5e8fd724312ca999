/**
 * order command: print the effective partition order.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_SETTINGS_PATH } from '../../core/config/loader.js';
import { logger as log } from '../../utils/logger.js';
import { loadOverlayConfig, type CommonOptions } from './shared.js';

/**
 * Create the order command.
 */
export function createOrderCommand(): Command {
  return new Command('order')
    .description('Show the effective partition order')
    .argument('<root>', 'Directory containing the partitions')
    .option('-c, --config <path>', 'Path to settings file', DEFAULT_SETTINGS_PATH)
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Explain why an override file was rejected')
    .action(async (root: string, options: CommonOptions) => {
      try {
        const overlayConfig = await loadOverlayConfig(root, options);
        const partitions = overlayConfig.getPartitions().map((partition) => partition.name);
        const overridden = overlayConfig.isPartitionOrderOverridden();

        if (options.json) {
          console.log(JSON.stringify({ partitions, overridden }, null, 2));
          return;
        }

        console.log(partitions.join(', '));
        console.log(chalk.dim(overridden ? 'Source: partition order override' : 'Source: default order'));
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}
