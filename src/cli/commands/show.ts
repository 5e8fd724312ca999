/**
 * show command: print one overlay's resolved configuration.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_SETTINGS_PATH } from '../../core/config/loader.js';
import { logger as log } from '../../utils/logger.js';
import { configurationToJson, loadOverlayConfig, type CommonOptions } from './shared.js';

/**
 * Create the show command.
 */
export function createShowCommand(): Command {
  return new Command('show')
    .description('Show the resolved configuration of one overlay package')
    .argument('<root>', 'Directory containing the partitions')
    .argument('<package>', 'Overlay package name')
    .option('-c, --config <path>', 'Path to settings file', DEFAULT_SETTINGS_PATH)
    .option('--json', 'Output as JSON')
    .action(async (root: string, packageName: string, options: CommonOptions) => {
      try {
        const overlayConfig = await loadOverlayConfig(root, options);
        const configuration = overlayConfig.getConfiguration(packageName);

        if (!configuration) {
          log.error(`Overlay ${packageName} not found`);
          process.exit(1);
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(configurationToJson(configuration), null, 2));
          return;
        }

        console.log(chalk.bold.cyan(configuration.packageName));
        console.log(`  target:       ${configuration.targetPackageName}`);
        console.log(`  partition:    ${configuration.partition}`);
        console.log(`  config index: ${configuration.configIndex}`);
        console.log(`  enabled:      ${configuration.enabled}`);
        console.log(`  mutable:      ${configuration.mutable}`);
        console.log(`  origin:       ${configuration.origin}`);
        if (configuration.declaredIn) {
          console.log(`  declared in:  ${configuration.declaredIn}`);
        }
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}
