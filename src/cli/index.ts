#!/usr/bin/env node
/**
 * density-scan Command-Line Interface
 *
 * Usage: density-scan <command> [options]
 */

import type { Command } from './types.js';
import { clusterCommand } from './commands/cluster.js';
import { configCommand } from './commands/config.js';
import { isLogLevel, setJsonMode, setLogLevel } from '../utils/logger.js';

const VERSION = '0.1.0';

const commands: Command[] = [clusterCommand, configCommand];

function showHelp(): void {
  console.log('density-scan: DBSCAN clustering');
  console.log('');
  console.log('Usage: density-scan <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('  --log-level <l>  debug | info | warn | error | silent');
  console.log('  --log-json       Write log lines as JSON');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Handle global flags
  if (args.includes('--version') || args.includes('-v')) {
    console.log(`density-scan ${VERSION}`);
    return;
  }

  const levelIndex = args.indexOf('--log-level');
  if (levelIndex >= 0) {
    const level = args[levelIndex + 1];
    if (!isLogLevel(level)) {
      console.error(`Unknown log level: ${level}`);
      process.exit(2);
    }
    setLogLevel(level);
    args.splice(levelIndex, 2);
  }

  const jsonIndex = args.indexOf('--log-json');
  if (jsonIndex >= 0) {
    setJsonMode(true);
    args.splice(jsonIndex, 1);
  }

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "density-scan --help" for available commands.');
    process.exit(2);
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
