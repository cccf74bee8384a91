import { Command } from 'commander';
import { BuildStage, IndexBuilder } from '../../services/index-builder.js';
import { ProgressBar, ProgressIndicator, formatDuration } from '../utils/progress.js';
import { promptConfirm } from '../utils/input.js';
import {
  CommonOptions,
  commandLogger,
  createBatcher,
  createLifecycle,
  createProvider,
  loadConfig,
  openStore,
} from '../utils/runtime.js';
import { formatValidationError } from '../utils/validation.js';

interface BuildIndexOptions extends CommonOptions {
  yes?: boolean;
  fromEmbedded?: string;
  input?: string[];
}

const STAGE_MESSAGES: Record<BuildStage, string> = {
  merge: 'Merging corpora...',
  embed: 'Embedding records...',
  reset: 'Recreating index...',
  upload: 'Uploading documents...',
  count: 'Counting documents...',
};

export function createBuildIndexCommand(): Command {
  return new Command('build-index')
    .description('Merge the corpora, embed every record and rebuild the vector index')
    .option('-i, --input <paths...>', 'Corpus files to merge (defaults to paths.fileCorpus and paths.webCorpus)')
    .option('--from-embedded <path>', 'Skip embedding and upload an existing embedded corpus')
    .option('-y, --yes', 'Do not ask before replacing the index')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--verbose', 'Show debug logging')
    .action(async (options: BuildIndexOptions) => {
      try {
        await buildIndex(options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function buildIndex(options: BuildIndexOptions): Promise<void> {
  const config = await loadConfig(options);
  const logger = commandLogger('build-index', options);

  console.log('🗂️  Build vector index');
  console.log(`📇 Index: ${config.index.name}`);
  console.log(`💾 Database: ${config.index.databasePath}`);
  console.log(`🤖 Embedding model: ${config.providers.openai.embeddingModel} (${config.embedding.dimensions} dimensions)`);
  console.log('');

  if (!options.yes) {
    const confirmed = await promptConfirm(`This replaces every document in "${config.index.name}". Continue?`, false);
    if (!confirmed) {
      console.log('Build cancelled.');
      return;
    }
  }

  const provider = createProvider(config);
  const store = openStore(config);
  const startTime = Date.now();
  const display: { spinner?: ProgressIndicator; bar?: ProgressBar } = {};

  const batcher = createBatcher(config, provider, logger, progress => {
    const bar = display.bar ?? new ProgressBar(progress.totalBatches, 'Embedding');
    display.bar = bar;
    bar.update(progress.completedBatches, `Embedding ${progress.embeddedRecords}/${progress.totalRecords}`);
  });

  const builder = new IndexBuilder(
    { batcher, lifecycle: createLifecycle(config, store, logger), store },
    {
      indexName: config.index.name,
      uploadBatchSize: config.index.uploadBatchSize,
      maxKeyLength: config.index.maxKeyLength,
      maxContentChars: config.index.maxContentChars,
      retry: config.retry,
      logger,
      onStage: stage => {
        display.spinner?.stop();
        display.bar?.finish();
        display.bar = undefined;
        display.spinner = undefined;
        if (stage === 'embed') {
          console.log(STAGE_MESSAGES.embed);
          return;
        }
        display.spinner = new ProgressIndicator(STAGE_MESSAGES[stage]);
        display.spinner.start();
      },
    }
  );

  try {
    if (options.fromEmbedded) {
      const stats = await builder.uploadEmbedded(options.fromEmbedded);
      display.spinner?.stop();
      console.log('');
      console.log(`✅ Uploaded ${stats.uploaded} documents in ${stats.batches} batch(es)`);
      console.log(`📊 ${stats.documentCount} documents in index (${formatDuration(Date.now() - startTime)})`);
      return;
    }

    const stats = await builder.build({
      inputs: options.input ?? [config.paths.fileCorpus, config.paths.webCorpus],
      combinedPath: config.paths.combinedCorpus,
      embeddedPath: config.paths.embeddedCorpus,
    });
    display.spinner?.stop();

    console.log('');
    console.log(`✅ Index rebuilt in ${formatDuration(Date.now() - startTime)}`);
    console.log(`📊 Merge: ${stats.merge.written} records, ${stats.merge.duplicates} duplicates, ${stats.merge.malformed} malformed lines`);
    console.log(`🧮 Embedded: ${stats.embedded} records`);
    console.log(`📤 Uploaded: ${stats.uploaded} documents in ${stats.batches} batch(es)`);
    console.log(`📇 Index now holds ${stats.documentCount} documents`);
  } catch (error) {
    display.spinner?.fail('Build failed');
    throw error;
  } finally {
    store.close();
  }
}
