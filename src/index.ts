#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Usage:
 *   ebook-mailer [send]    Mail every file in EBOOK_TO_SEND_DIR, then move it to EBOOK_SENT_DIR
 *   ebook-mailer config    Print the effective configuration (secret masked)
 *   ebook-mailer logout    Delete the cached credential file
 *   ebook-mailer help      Show this message
 *
 * Exit code 0 when the command completed fully, 1 otherwise.
 *
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { loadAppConfig } from './config.js';
import { errorMessage } from './errors.js';
import { executeConfigCommand } from './commands/config.js';
import { executeLogoutCommand } from './commands/logout.js';
import { executeSendCommand } from './commands/send.js';

const USAGE = `Usage: ebook-mailer [command]

Commands:
  send     Mail every e-book in the source directory (default)
  config   Print the effective configuration
  logout   Delete the cached credential file
  help     Show this message

Configuration is read from environment variables or a .env file.
See .env.example for the full list.`;

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'send';

  switch (command) {
    case 'send':
      await executeSendCommand(loadAppConfig());
      break;
    case 'config':
      executeConfigCommand(loadAppConfig());
      break;
    case 'logout':
      await executeLogoutCommand(loadAppConfig());
      break;
    case 'help':
    case '--help':
    case '-h':
      console.log(USAGE);
      break;
    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      process.exit(1);
  }
}

main()
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    console.error(`[cli] ${errorMessage(err)}`);
    process.exit(1);
  });
