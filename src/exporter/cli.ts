#!/usr/bin/env node
/**
 * Deck Exporter CLI
 * Anki (AnkiConnect) → CSV + media folder
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadEnvironment } from '../config/environment.js';
import { AnkiConnectClient } from '../utils/api-client.js';
import { getErrorMessage } from '../utils/error-handler.js';
import { createConsoleLogger } from '../utils/logger.js';
import { exportCommand, listCommand } from './commands.js';
import type { ExportContext } from './types.js';

const program = new Command();

type GlobalOptions = {
  url?: string;
};

function createContext(signal?: AbortSignal): ExportContext {
  const { url } = program.opts<GlobalOptions>();
  const client = AnkiConnectClient.fromEnvironment(loadEnvironment(), url ? { url } : {});
  return { client, logger: createConsoleLogger(), signal };
}

async function runCommand(command: () => Promise<number>): Promise<void> {
  try {
    const exitCode = await command();
    if (exitCode !== 0) {
      process.exit(exitCode);
    }
  } catch (error) {
    console.error(chalk.red('❌ Error:'), getErrorMessage(error));
    process.exit(1);
  }
}

program
  .name('anki-export')
  .description('Export Anki decks to CSV files, images included, through AnkiConnect')
  .version('1.0.0')
  .option('-u, --url <url>', 'AnkiConnect endpoint (default: $ANKI_CONNECT_URL or http://127.0.0.1:8765)');

// export: decks → <destination>/decks, images → <destination>/media
program
  .command('export <destination> [selection]')
  .description('Export all decks, or the decks at the given indices (e.g. "0,2,5")')
  .action(async (destination: string, selection: string | undefined) => {
    const controller = new AbortController();
    // Ctrl+C finishes the current note, then stops
    process.once('SIGINT', () => {
      console.error(chalk.yellow('\n⚠️  Stopping after the current note...'));
      controller.abort();
    });

    await runCommand(() => exportCommand(destination, selection, createContext(controller.signal)));
  });

// list: numbered deck list for picking a selection
program
  .command('list')
  .description('List decks with the indices accepted by "export"')
  .action(async () => {
    await runCommand(() => listCommand(createContext()));
  });

await program.parseAsync();
