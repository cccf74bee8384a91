import { Command } from 'commander';
import { AxiosPageFetcher, WebCrawler } from '../../services/web-crawler.js';
import { formatDuration } from '../utils/progress.js';
import { CommonOptions, commandLogger, loadConfig } from '../utils/runtime.js';
import { formatValidationError, parsePositiveInt, validateStartUrl } from '../utils/validation.js';

interface CrawlOptions extends CommonOptions {
  out?: string;
  maxPages?: number;
}

export function createCrawlCommand(): Command {
  return new Command('crawl')
    .description('Crawl same-host HTML pages into the web corpus')
    .argument('[startUrl]', 'Page to start from (defaults to crawler.startUrl)')
    .option('-o, --out <path>', 'Output JSONL path (defaults to paths.webCorpus)')
    .option('-n, --max-pages <number>', 'Pages to extract', parsePositiveInt('max-pages'))
    .option('--config-path <path>', 'Path to configuration file')
    .option('--verbose', 'Show debug logging')
    .action(async (startUrl: string | undefined, options: CrawlOptions) => {
      try {
        await crawl(startUrl, options);
      } catch (error) {
        console.error(formatValidationError(error));
        process.exit(1);
      }
    });
}

async function crawl(startUrlArg: string | undefined, options: CrawlOptions): Promise<void> {
  const config = await loadConfig(options);
  const startUrl = startUrlArg ?? config.crawler.startUrl;
  validateStartUrl(startUrl);

  const outPath = options.out ?? config.paths.webCorpus;
  const maxPages = options.maxPages ?? config.crawler.maxPages;
  const startTime = Date.now();

  console.log('🌐 Web crawl');
  console.log(`🔗 Start: ${startUrl}`);
  console.log(`📄 Max pages: ${maxPages}`);
  console.log(`📝 Output: ${outPath}`);
  console.log('');

  const crawler = new WebCrawler(
    new AxiosPageFetcher({ timeoutMs: config.crawler.timeoutMs, maxBytes: config.crawler.maxBytes }),
    {
      maxPages,
      delayMs: config.crawler.delayMs,
      maxBytes: config.crawler.maxBytes,
      maxTextChars: config.crawler.maxTextChars,
      chunking: config.chunking.web,
      logger: commandLogger('crawl', options),
      onPage: (url, count) => console.log(`  ✅ ${url} (${count} chunks)`),
    }
  );

  const { stats } = await crawler.crawl(startUrl, outPath);

  console.log('');
  console.log(`✅ Saved ${stats.pagesExtracted} pages (${stats.chunksWritten} chunks) in ${formatDuration(Date.now() - startTime)}`);
  console.log(`📊 Visited ${stats.pagesVisited} URLs, ${stats.duplicates} duplicate chunks dropped`);
}
