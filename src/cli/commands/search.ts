import { Command } from 'commander';
import { sourceLabel } from '../../services/retrieval.js';
import { SearchResponse } from '../../types/search.js';
import { TextProcessor } from '../../utils/text-processing.js';
import { ProgressIndicator } from '../utils/progress.js';
import { CommonOptions, commandLogger, createProvider, createRanker, loadConfig, openStore } from '../utils/runtime.js';
import { formatValidationError, parsePositiveInt, validateQueryString } from '../utils/validation.js';

interface SearchOptions extends CommonOptions {
  topK?: number;
  format: string;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Show the chunks retrieved for a query, without generating an answer')
    .argument('<query>', 'Search query text')
    .option('-k, --top-k <number>', 'Number of chunks to retrieve', parsePositiveInt('top-k'))
    .option('--format <format>', 'Output format (table|json)', 'table')
    .option('--config-path <path>', 'Path to configuration file')
    .option('--verbose', 'Show debug logging')
    .action(async (query: string, options: SearchOptions) => {
      try {
        await search(query, options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function search(query: string, options: SearchOptions): Promise<void> {
  validateQueryString(query);
  const config = await loadConfig(options);
  const topK = options.topK ?? config.retrieval.topK;
  const store = openStore(config);

  try {
    const ranker = createRanker(config, createProvider(config), store, commandLogger('search', options));

    if (options.format === 'json') {
      console.log(JSON.stringify(await ranker.search(query, topK), null, 2));
      return;
    }

    console.log('');
    console.log('🔍 NDIS Search');
    console.log('');
    console.log(`📝 Query: "${query}"`);
    console.log(`🎯 Top k: ${topK}`);
    console.log('');

    const progress = new ProgressIndicator('Searching index...');
    progress.start();
    let response: SearchResponse;
    try {
      response = await ranker.search(query, topK);
      progress.stop();
    } catch (error) {
      progress.fail('Search failed');
      throw error;
    }

    displayResults(response);
  } finally {
    store.close();
  }
}

function displayResults(response: SearchResponse): void {
  if (response.matches.length === 0) {
    console.log('❌ No results found for your query.');
    console.log('💡 Check that the index was built with "ndis-rag build-index".');
    return;
  }

  console.log(`✅ Found ${response.matches.length} results in ${response.executionTime}ms`);
  console.log('');

  response.matches.forEach((match, i) => {
    const position = i + 1;
    console.log(`${position}. ${sourceLabel(match, position)}  (score ${match.score.toFixed(3)})`);
    console.log(`   ${TextProcessor.truncate(TextProcessor.collapseWhitespace(match.content), 200)}`);
    console.log('');
  });
}
