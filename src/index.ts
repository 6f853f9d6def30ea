import { Command } from 'commander';
import { CLI_VERSION } from './constants/index.js';
import { logger } from './utils/logger.js';

// Import command setup functions
import { setupResolveCommand } from './commands/resolve.js';
import { setupParseCommand } from './commands/parse.js';

/**
 * modsel CLI - Main entry point
 *
 * Resolves Go module versions across manifests, workspaces and pinned
 * module declarations.
 */

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('modsel')
  .description('modsel - Go module version selection across configuration units')
  .version(CLI_VERSION)
  .option('--cwd <dir>', 'set working directory')
  .option('--verbose', 'enable debug logging')
  .configureHelp({
    sortSubcommands: true
  });

setupResolveCommand(program);
setupParseCommand(program);

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  // If no arguments provided (just 'modsel'), show help and exit successfully
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync();
}

// Export the program for testing purposes
export { program };
