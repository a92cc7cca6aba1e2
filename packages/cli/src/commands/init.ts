// packages/cli/src/commands/init.ts — Write a default .accelbuild.yml

import { loadConfig, writeConfig } from '@accelbuild/core';
import chalk from 'chalk';

import type { GlobalOptions } from '../utils.js';

export interface InitOptions extends GlobalOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const cwd = process.cwd();
  // Defaults only: neither an existing file nor the environment leaks in
  const config = loadConfig({ projectDir: cwd, skipFile: true, env: {} });
  const configPath = writeConfig(config, cwd, { force: options.force });

  console.error(chalk.green(`\nWrote ${configPath}`));
  console.error(chalk.gray(`  source: ${config.source.url} (${config.source.ref}) -> ${config.source.path}`));
  console.error(chalk.gray(`  sdk:    ${config.sdk.defaultRoot}, fallback target ${config.sdk.fallbackTarget}`));
  console.error(chalk.gray('\nNext: accelbuild doctor'));
}
