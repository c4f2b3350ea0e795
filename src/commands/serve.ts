import { loadConfig } from '../server/config';
import { startServer } from '../server';
import { logger } from '../server/logger';

/**
 * Help text for the serve command
 */
export const SERVE_HELP = `
mergedesk serve - Start the merge request server

Usage: mergedesk serve [options]

Options:
  --port <number>    Port to listen on (default: $PORT or 3000)
  --host <hostname>  Hostname to bind to (default: $HOST or 0.0.0.0)
  --repos <path>     Directory holding the bare repositories (default: $REPOS_DIR or ./repos)
  -h, --help         Show this help message
`;

export interface ServeOptions {
  port?: string;
  host?: string;
  repos?: string;
  help: boolean;
}

/**
 * Parse serve options; values override the environment
 */
export function parseServeOptions(args: string[]): ServeOptions {
  const options: ServeOptions = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];

    switch (arg) {
      case '--port':
      case '-p':
        if (value !== undefined) {
          options.port = value;
          i++;
        }
        break;

      case '--host':
      case '-H':
        if (value !== undefined) {
          options.host = value;
          i++;
        }
        break;

      case '--repos':
      case '-r':
        if (value !== undefined) {
          options.repos = value;
          i++;
        }
        break;

      case '--help':
      case '-h':
        options.help = true;
        break;
    }
  }

  return options;
}

/**
 * Handle the serve command
 */
export function handleServe(args: string[]): void {
  const options = parseServeOptions(args);
  if (options.help) {
    console.log(SERVE_HELP);
    return;
  }

  loadConfig({
    ...process.env,
    ...(options.port ? { PORT: options.port } : {}),
    ...(options.host ? { HOST: options.host } : {}),
    ...(options.repos ? { REPOS_DIR: options.repos } : {}),
  });

  const server = startServer();

  const shutdown = (signal: string): void => {
    logger.info('Shutting down server', { signal });
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
