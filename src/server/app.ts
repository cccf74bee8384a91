import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { marked } from 'marked';
import { Answer } from '../services/answer.js';
import { ContextReference } from '../types/search.js';
import { errorMessage } from '../utils/errors.js';
import { Logger, silentLogger } from '../utils/logger.js';

export const SEND_JSON_ERROR = "Send JSON: {'query': '...'}";
export const MISSING_QUERY_ERROR = "Please provide 'query'";

export interface Answerer {
  answer(question: string): Promise<Answer>;
}

const BULLET_MARKERS = new Set(['-', '*', '•']);

/**
 * Models sometimes emit a bullet marker alone on its line with the item
 * text below it. Join each lone marker to the next non-empty line as a
 * `- ` item and collapse runs of blank lines.
 */
export function fixBullets(text: string): string {
  const lines = text.split(/\r?\n/).map(line => line.trimEnd());
  const out: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (!BULLET_MARKERS.has(line.trim())) {
      out.push(line);
      continue;
    }

    let next = i + 1;
    while (next < lines.length && (lines[next] ?? '').trim() === '') {
      next++;
    }
    if (next < lines.length) {
      out.push(`- ${(lines[next] ?? '').trimStart()}`);
    }
    i = next;
  }

  return out.join('\n').replace(/\n{3,}/g, '\n\n').trim();
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Turn `[n]` citations into links for references that have a URL.
 */
export function linkCitations(html: string, references: ContextReference[]): string {
  const urls = new Map<number, string>();
  for (const reference of references) {
    if (reference.url) {
      urls.set(reference.number, reference.url);
    }
  }
  if (urls.size === 0) {
    return html;
  }

  return html.replace(/\[(\d+)\]/g, (citation, digits: string) => {
    const url = urls.get(Number(digits));
    return url ? `<a href="${escapeAttribute(url)}" target="_blank" rel="noopener">${citation}</a>` : citation;
  });
}

export async function renderAnswer(answer: Answer): Promise<string> {
  const html = await marked.parse(fixBullets(answer.answer), { gfm: true });
  return linkCitations(html, answer.references);
}

function readQuery(body: unknown): string {
  if (typeof body !== 'object' || body === null || !('query' in body)) {
    return '';
  }
  return typeof body.query === 'string' ? body.query.trim() : '';
}

export function createApp(answerer: Answerer, options: { logger?: Logger } = {}): express.Express {
  const logger = options.logger ?? silentLogger;
  const app = express();

  app.use(express.json({ limit: '64kb' }));

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.post('/api/plan', async (req: Request, res: Response, next: NextFunction) => {
    if (!req.is('application/json')) {
      res.status(400).json({ error: SEND_JSON_ERROR });
      return;
    }

    const query = readQuery(req.body);
    if (!query) {
      res.status(400).json({ error: MISSING_QUERY_ERROR });
      return;
    }

    try {
      const answer = await answerer.answer(query);
      res.json({ answer: answer.answer, answer_html: await renderAnswer(answer) });
    } catch (error) {
      next(error);
    }
  });

  // Malformed JSON bodies surface here from express.json()
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: SEND_JSON_ERROR });
      return;
    }
    logger.error('request failed', error);
    res.status(500).json({ error: errorMessage(error) });
  });

  return app;
}

export function startServer(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.once('error', reject);
  });
}
