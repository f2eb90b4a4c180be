#!/usr/bin/env node

import chalk from 'chalk';
import { LibraryExportCLI } from './LibraryExportCLI.js';
import { ConfigManager } from '../config/ConfigManager.js';

async function main(): Promise<void> {
  ConfigManager.loadEnvFile();

  const options = LibraryExportCLI.parseArguments(process.argv.slice(2));
  const cli = new LibraryExportCLI(options);
  process.exitCode = await cli.main();
}

main().catch((error) => {
  console.error(chalk.red('Error fatal:'), error);
  process.exit(1);
});
