#!/usr/bin/env node

import * as dotenv from 'dotenv';

dotenv.config();

import { handleServe } from './commands/serve';
import { logger } from './server/logger';

const VERSION = '0.1.0';

const HELP = `
mergedesk - Merge request service for self-hosted Git projects

Usage: mergedesk <command> [options]

Commands:
  serve              Start the HTTP server
  help               Show this help message

Options for serve:
  --port <number>    Port to listen on (default: $PORT or 3000)
  --host <hostname>  Hostname to bind to (default: $HOST or 0.0.0.0)
  --repos <path>     Directory holding the bare repositories (default: $REPOS_DIR or ./repos)

Configuration is read from the environment and from .env; see .env.example.
`;

function main(): void {
  const [command, ...args] = process.argv.slice(2);

  switch (command) {
    case 'serve':
      handleServe(args);
      break;

    case '--version':
    case '-v':
      console.log(`mergedesk version ${VERSION}`);
      break;

    case undefined:
    case 'help':
    case '--help':
    case '-h':
      console.log(HELP);
      break;

    default:
      console.error(`mergedesk: '${command}' is not a mergedesk command. See 'mergedesk help'.`);
      process.exit(1);
  }
}

try {
  main();
} catch (error) {
  logger.fatal(error instanceof Error ? error.message : String(error));
  process.exit(1);
}
