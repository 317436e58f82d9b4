import { Command } from 'commander';
import { executeHandler } from '../types';

export const checkCommand = new Command('check')
  .description('Quality gate: fail on syntax errors, error-level smells and critical or high security issues')
  .argument('[paths...]', 'Files or directories (default: current directory)')
  .option('--staged', 'Check the staged Python files instead of paths', false)
  .option('--fail-on-warning', 'Also fail on warning-level smells', false)
  .option('-c, --config <file>', 'Config file (default: .pydelta.json at the repository root)')
  .option('--text', 'Print a plain-text report instead of JSON', false)
  .action(async (paths, options) => {
    await executeHandler('check', { paths, ...options });
  });
