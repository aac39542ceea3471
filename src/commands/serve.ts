import { Command } from 'commander';
import { startServer } from '../server/index.js';
import { errorMessage } from '../utils/errors.js';
import { loadRuntime, positiveInt } from './shared.js';

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the read API over the local store')
    .option('-p, --port <port>', 'Port to listen on (default: SERVER_PORT)', positiveInt)
    .action((options: { port?: number }) => {
      try {
        const { config, logger } = loadRuntime({ logFile: 'api.log', scope: 'server' });
        const server = startServer(config, logger, options.port ?? config.SERVER_PORT);

        const shutdown = (signal: string): void => {
          logger.info(`Received ${signal}, shutting down`);
          server.close((error) => {
            if (error) {
              logger.error(`Error closing server: ${errorMessage(error)}`);
              process.exitCode = 1;
            }
            process.exit();
          });
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
      } catch (error) {
        console.error('Error:', errorMessage(error));
        process.exitCode = 1;
      }
    });
}
