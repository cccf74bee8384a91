import { Command } from 'commander';
import { createApp, startServer } from '../../server/app.js';
import { CommonOptions, commandLogger, createAnswerService, createProvider, loadConfig, openStore } from '../utils/runtime.js';
import { formatValidationError, parsePositiveInt } from '../utils/validation.js';

interface ServeOptions extends CommonOptions {
  port?: number;
  host?: string;
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Serve the question-answering HTTP API')
    .option('-p, --port <number>', 'Port to listen on (defaults to server.port)', parsePositiveInt('port'))
    .option('--host <host>', 'Interface to bind (defaults to server.host)')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--verbose', 'Show debug logging')
    .action(async (options: ServeOptions) => {
      try {
        await serve(options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function serve(options: ServeOptions): Promise<void> {
  const config = await loadConfig(options);
  const logger = commandLogger('serve', options);
  const store = openStore(config);
  const answerer = createAnswerService(config, createProvider(config), store, logger);

  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;
  const server = await startServer(createApp(answerer, { logger }), host, port);

  console.log(`🚀 Listening on http://${host}:${port}`);
  console.log('   POST /api/plan  {"query": "..."}');

  const shutdown = () => {
    console.log('\n👋 Shutting down');
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
