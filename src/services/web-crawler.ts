import axios, { AxiosInstance } from 'axios';
import { ChunkSettings } from '../types/config.js';
import { CorpusRecord } from '../types/record.js';
import { TextChunker } from '../utils/chunking.js';
import { writeCorpus } from '../utils/corpus-file.js';
import { errorMessage } from '../utils/errors.js';
import { extractLinks, extractTitle, htmlToText } from '../utils/html.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { webDisplayName, webRecordId } from '../utils/record-identity.js';
import { sleep } from '../utils/retry.js';
import { TextProcessor } from '../utils/text-processing.js';
import { ContentDeduplicator, computeFingerprint } from './deduplicator.js';

export const SKIPPED_EXTENSIONS = [
  '.pdf', '.doc', '.docx', '.xls', '.xlsx', '.ppt', '.pptx', '.zip',
  '.jpg', '.jpeg', '.png', '.gif', '.svg', '.webp', '.mp4', '.webm',
  '.json', '.xml', '.rss', '.ics', '.apk', '.csv', '.txt',
];

export interface PageHead {
  contentType: string;
  contentLength?: number;
}

export interface FetchedPage {
  contentType: string;
  body: string;
}

/**
 * HTTP access used by the crawler; tests substitute an in-memory site.
 */
export interface PageFetcher {
  head(url: string): Promise<PageHead>;
  get(url: string): Promise<FetchedPage>;
}

function headerValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(String).join(', ');
  }
  return value === undefined || value === null ? '' : String(value);
}

export class AxiosPageFetcher implements PageFetcher {
  private client: AxiosInstance;

  constructor(options: { timeoutMs: number; maxBytes: number }) {
    this.client = axios.create({
      timeout: options.timeoutMs,
      maxContentLength: options.maxBytes,
      maxRedirects: 5,
      responseType: 'text',
      headers: { 'User-Agent': 'ndis-rag-crawler/0.1' },
    });
  }

  async head(url: string): Promise<PageHead> {
    const response = await this.client.head(url);
    const length = Number(headerValue(response.headers['content-length']));
    const head: PageHead = { contentType: headerValue(response.headers['content-type']) };
    if (Number.isFinite(length) && length > 0) head.contentLength = length;
    return head;
  }

  async get(url: string): Promise<FetchedPage> {
    const response = await this.client.get<string>(url);
    return {
      contentType: headerValue(response.headers['content-type']),
      body: typeof response.data === 'string' ? response.data : String(response.data),
    };
  }
}

export interface CrawlerOptions {
  maxPages: number;
  delayMs: number;
  maxBytes: number;
  maxTextChars: number;
  chunking: ChunkSettings;
  logger?: Logger;
  onPage?: (url: string, recordCount: number) => void;
}

export interface CrawlStats {
  pagesVisited: number;
  pagesExtracted: number;
  chunksWritten: number;
  duplicates: number;
}

export interface CrawlResult {
  records: CorpusRecord[];
  stats: CrawlStats;
}

interface ExtractedPage {
  text: string;
  title?: string;
  links: string[];
}

/**
 * Same host (or relative), http(s), no fragment, and not a known binary or
 * asset extension.
 */
export function isHtmlUrl(link: string, startUrl: string): boolean {
  if (!URL.canParse(link, startUrl)) {
    return false;
  }
  const url = new URL(link, startUrl);
  const start = new URL(startUrl);

  if (url.host !== start.host || (url.protocol !== 'http:' && url.protocol !== 'https:')) {
    return false;
  }
  if (url.hash) {
    return false;
  }
  const pathname = url.pathname.toLowerCase();
  return !SKIPPED_EXTENSIONS.some(extension => pathname.endsWith(extension));
}

/**
 * Breadth-first crawl of one site. `maxPages` counts pages that produced
 * text; fetch failures and non-HTML responses do not count.
 */
export class WebCrawler {
  private fetcher: PageFetcher;
  private chunker: TextChunker;
  private options: CrawlerOptions;
  private logger: Logger;

  constructor(fetcher: PageFetcher, options: CrawlerOptions) {
    this.fetcher = fetcher;
    this.chunker = new TextChunker(options.chunking);
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async crawl(startUrl: string, outPath?: string): Promise<CrawlResult> {
    const queue: string[] = [new URL(startUrl).href];
    const visited = new Set<string>();
    const deduplicator = new ContentDeduplicator();
    const records: CorpusRecord[] = [];
    const stats: CrawlStats = { pagesVisited: 0, pagesExtracted: 0, chunksWritten: 0, duplicates: 0 };

    while (queue.length > 0 && stats.pagesExtracted < this.options.maxPages) {
      const url = queue.shift();
      if (url === undefined || visited.has(url)) {
        continue;
      }
      visited.add(url);
      stats.pagesVisited++;

      this.logger.info(`scraping ${url}`);
      const page = await this.scrapePage(url);

      if (page) {
        let kept = 0;
        for (const record of this.toRecords(url, page)) {
          if (deduplicator.accept(record)) {
            records.push(record);
            kept++;
          }
        }
        stats.pagesExtracted++;
        this.options.onPage?.(url, kept);

        for (const link of page.links) {
          if (isHtmlUrl(link, startUrl) && !visited.has(link)) {
            queue.push(link);
          }
        }
      }

      if (this.options.delayMs > 0) {
        await sleep(this.options.delayMs);
      }
    }

    stats.duplicates = deduplicator.duplicateCount;
    stats.chunksWritten = outPath ? await writeCorpus(outPath, records) : records.length;
    this.logger.info(`saved ${stats.pagesExtracted} pages (${stats.chunksWritten} chunks)`);

    return { records, stats };
  }

  /**
   * Fetch and extract one page; null when it is not usable HTML or the
   * fetch fails.
   */
  async scrapePage(url: string): Promise<ExtractedPage | null> {
    try {
      const head = await this.fetcher.head(url);
      if (!head.contentType.includes('text/html')) {
        this.logger.debug(`skip ${url}: content type ${head.contentType || 'unknown'}`);
        return null;
      }
      if (head.contentLength !== undefined && head.contentLength > this.options.maxBytes) {
        this.logger.debug(`skip ${url}: ${head.contentLength} bytes`);
        return null;
      }

      const response = await this.fetcher.get(url);
      if (!response.contentType.includes('text/html')) {
        return null;
      }

      const text = TextProcessor.truncate(TextProcessor.cleanWebText(htmlToText(response.body)), this.options.maxTextChars);
      if (!text) {
        return null;
      }

      const page: ExtractedPage = { text, links: extractLinks(response.body, url) };
      const title = extractTitle(response.body);
      if (title) page.title = title;
      return page;
    } catch (error) {
      this.logger.warn(`failed to scrape ${url}: ${errorMessage(error)}`);
      return null;
    }
  }

  private toRecords(url: string, page: ExtractedPage): CorpusRecord[] {
    const chunks = this.chunker.chunk(page.text);

    return chunks.map(chunk => {
      const record: CorpusRecord = {
        id: webRecordId(url, chunk.index),
        sourceType: 'web-page',
        sourceLocator: url,
        fileName: webDisplayName(url),
        fileType: 'html',
        text: chunk.text,
        contentFingerprint: computeFingerprint('web-page', url, chunk.text),
        chunkIndex: chunk.index,
        totalChunks: chunks.length,
      };
      if (page.title) record.title = page.title;
      return record;
    });
  }
}
