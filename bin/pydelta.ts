#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { summaryCommand, diffCommand } from '../src/cli/commands/structureCommands';
import { smellsCommand, securityCommand, metricsCommand } from '../src/cli/commands/scanCommands';
import { checkCommand } from '../src/cli/commands/checkCommand';

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readVersionFromPackageJson(): string {
  const pkgPath = findPackageJson(__dirname);
  if (!pkgPath) return '0.0.0';
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function main() {
  const program = new Command();
  program
    .name('pydelta')
    .description('pydelta: structural diff, complexity, smells and security scanning for Python sources')
    .version(readVersionFromPackageJson());

  program
    .addCommand(summaryCommand)
    .addCommand(diffCommand)
    .addCommand(smellsCommand)
    .addCommand(securityCommand)
    .addCommand(metricsCommand)
    .addCommand(checkCommand);

  program.parse(process.argv);
}

main();
