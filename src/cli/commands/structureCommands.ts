import { Command } from 'commander';
import { executeHandler } from '../types';

export const summaryCommand = new Command('summary')
  .description('Extract functions, classes, imports, decorators, docstrings and complexity from one file')
  .argument('<file>', 'Python source file')
  .option('--text', 'Print a plain-text report instead of JSON', false)
  .action(async (file, options) => {
    await executeHandler('summary', { file, ...options });
  });

export const diffCommand = new Command('diff')
  .description('Structural diff between two versions of a file')
  .argument('<old>', 'Old version (or the file to read at --rev)')
  .argument('[new]', 'New version')
  .option('-r, --rev <rev>', 'Read <old> at this git revision and compare it with the working tree copy')
  .option('--text', 'Print a plain-text report instead of JSON', false)
  .action(async (oldFile, newFile, options) => {
    await executeHandler('diff', { old: oldFile, new: newFile, ...options });
  });
