import { Command } from 'commander';
import { Answer } from '../../services/answer.js';
import { ProgressIndicator } from '../utils/progress.js';
import { CommonOptions, commandLogger, createAnswerService, createProvider, loadConfig, openStore } from '../utils/runtime.js';
import { formatValidationError, validateQueryString } from '../utils/validation.js';

interface AskOptions extends CommonOptions {
  json?: boolean;
}

export function createAskCommand(): Command {
  return new Command('ask')
    .description('Answer a question from the indexed NDIS content')
    .argument('<question...>', 'Question text')
    .option('--json', 'Print the answer and references as JSON')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--verbose', 'Show debug logging')
    .action(async (words: string[], options: AskOptions) => {
      try {
        await ask(words.join(' '), options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function ask(question: string, options: AskOptions): Promise<void> {
  validateQueryString(question);
  const config = await loadConfig(options);
  const store = openStore(config);

  try {
    const service = createAnswerService(config, createProvider(config), store, commandLogger('ask', options));

    if (options.json) {
      console.log(JSON.stringify(await service.answer(question), null, 2));
      return;
    }

    const progress = new ProgressIndicator('Thinking...');
    progress.start();
    let result: Answer;
    try {
      result = await service.answer(question);
      progress.stop();
    } catch (error) {
      progress.fail('Could not answer');
      throw error;
    }

    console.log('');
    console.log(result.answer);
    if (result.references.length > 0) {
      console.log('');
      console.log('📚 Sources:');
      for (const reference of result.references) {
        console.log(`  [${reference.number}] ${reference.label}`);
      }
    }
  } finally {
    store.close();
  }
}
