import { Command } from 'commander';
import { executeHandler } from '../types';

export const smellsCommand = new Command('smells')
  .description('Detect long functions, long parameter lists, deep nesting and god classes')
  .argument('<paths...>', 'Files or directories')
  .option('-c, --config <file>', 'Config file (default: .pydelta.json at the repository root)')
  .option('--long-function-lines <n>', 'Long function threshold')
  .option('--max-params <n>', 'Parameter count threshold')
  .option('--max-nesting <n>', 'Nesting depth threshold')
  .option('--max-methods <n>', 'God class method threshold')
  .option('--text', 'Print a plain-text report instead of JSON', false)
  .action(async (paths, options) => {
    await executeHandler('smells', { paths, ...options });
  });

export const securityCommand = new Command('security')
  .description('Scan for dangerous calls, risky imports, shell injection and hardcoded secrets')
  .argument('<paths...>', 'Files or directories')
  .option('-c, --config <file>', 'Config file (default: .pydelta.json at the repository root)')
  .option('--text', 'Print a plain-text report instead of JSON', false)
  .action(async (paths, options) => {
    await executeHandler('security', { paths, ...options });
  });

export const metricsCommand = new Command('metrics')
  .description('Line counts, symbol counts, docstring coverage and average complexity')
  .argument('<paths...>', 'Files or directories')
  .option('--text', 'Print a plain-text report instead of JSON', false)
  .action(async (paths, options) => {
    await executeHandler('metrics', { paths, ...options });
  });
