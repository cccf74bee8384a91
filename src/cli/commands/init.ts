import { Command } from 'commander';
import { OpenAIProvider } from '../../providers/openai.js';
import { AssistantConfig } from '../../types/config.js';
import { ConfigManager } from '../../utils/config.js';
import { ProgressIndicator } from '../utils/progress.js';
import { promptConfirm, promptSecure, promptUser } from '../utils/input.js';
import { formatValidationError, validateApiKey } from '../utils/validation.js';

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create the configuration file with interactive setup')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--force', 'Overwrite existing configuration')
    .action(async (options: { configPath?: string; force?: boolean }) => {
      try {
        await initializeConfiguration(options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function initializeConfiguration(options: { configPath?: string; force?: boolean }): Promise<void> {
  console.log('🚀 NDIS Assistant Configuration Setup');
  console.log('');

  const configManager = new ConfigManager(options.configPath);

  if (configManager.exists() && !options.force) {
    const overwrite = await promptConfirm('Configuration already exists. Do you want to overwrite it?', false);
    if (!overwrite) {
      console.log('Configuration setup cancelled.');
      return;
    }
  }

  const config = configManager.createDefault();

  console.log('📋 OpenAI Configuration');
  config.providers.openai.apiKey = await configureApiKey(config);
  config.providers.openai.embeddingModel = await promptWithDefault('Embedding model', config.providers.openai.embeddingModel);
  config.providers.openai.chatModel = await promptWithDefault('Chat model', config.providers.openai.chatModel);
  console.log('');

  console.log('📋 Index Configuration');
  config.index.name = await promptWithDefault('Index name', config.index.name);
  config.retrieval.topK = await promptNumber('Chunks retrieved per question', config.retrieval.topK, 1, 100);
  console.log('');

  const progress = new ProgressIndicator('Saving configuration...');
  progress.start();
  try {
    await configManager.save(config);
    progress.stop(`Configuration saved to ${configManager.getConfigPath()}`);
  } catch (error) {
    progress.fail('Failed to save configuration');
    throw error;
  }

  printNextSteps(config);
}

async function configureApiKey(config: AssistantConfig): Promise<string> {
  for (;;) {
    const apiKey = await promptSecure('Enter your OpenAI API key: ');

    try {
      validateApiKey(apiKey);

      const progress = new ProgressIndicator('Validating OpenAI API key...');
      progress.start();
      const provider = new OpenAIProvider({ ...config.providers.openai, apiKey });
      if (await provider.validateApiKey()) {
        progress.stop('OpenAI API key is valid!');
        return apiKey;
      }
      progress.fail('Invalid OpenAI API key');
    } catch (error) {
      console.log(formatValidationError(error));
    }

    const retry = await promptConfirm('Would you like to try again?', true);
    if (!retry) {
      throw new Error('OpenAI configuration cancelled');
    }
  }
}

async function promptWithDefault(label: string, defaultValue: string): Promise<string> {
  const answer = await promptUser(`${label} (${defaultValue}): `);
  return answer || defaultValue;
}

async function promptNumber(label: string, defaultValue: number, min: number, max: number): Promise<number> {
  for (;;) {
    const answer = await promptUser(`${label} (${defaultValue}): `);
    if (answer === '') {
      return defaultValue;
    }
    const parsed = Number(answer);
    if (Number.isInteger(parsed) && parsed >= min && parsed <= max) {
      return parsed;
    }
    console.log(`Please enter a number between ${min} and ${max}`);
  }
}

function printNextSteps(config: AssistantConfig): void {
  console.log('');
  console.log('✅ Setup complete!');
  console.log('');
  console.log('Next steps:');
  console.log(`  1. Parse documents:   ndis-rag ingest <data-dir>`);
  console.log(`  2. Crawl the website: ndis-rag crawl ${config.crawler.startUrl}`);
  console.log('  3. Build the index:   ndis-rag build-index');
  console.log('  4. Ask a question:    ndis-rag ask "What is a plan review?"');
  console.log('');
}
