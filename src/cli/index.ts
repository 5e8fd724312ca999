/**
 * CLI program assembly.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createResolveCommand } from './commands/resolve.js';
import { createOrderCommand } from './commands/order.js';
import { createShowCommand } from './commands/show.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('overlayconf')
    .description('Resolve partition order and overlay package policy')
    .version(readVersion());
  [createResolveCommand, createOrderCommand, createShowCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
