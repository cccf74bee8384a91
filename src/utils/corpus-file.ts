import { promises as fs, existsSync, createReadStream } from 'fs';
import path from 'path';
import { createInterface } from 'readline';
import { z } from 'zod';
import { CorpusRecord, SourceType } from '../types/record.js';
import { FileError } from './errors.js';

const NumberLike = z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]);

/**
 * A corpus line as found on disk. Besides the canonical field names this
 * accepts the older snake_case layout and the `content` / `page_content` /
 * `chunk` payload aliases; `toRecord` folds them into one shape.
 */
const CorpusLineSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  sourceType: z.string().optional(),
  source_type: z.string().optional(),
  sourceLocator: z.string().optional(),
  path: z.string().optional(),
  source: z.string().optional(),
  fileName: z.string().optional(),
  file_name: z.string().optional(),
  fileType: z.string().optional(),
  file_type: z.string().optional(),
  title: z.string().optional(),
  page: NumberLike.optional(),
  page_number: NumberLike.optional(),
  text: z.string().optional(),
  content: z.string().optional(),
  page_content: z.string().optional(),
  chunk: z.string().optional(),
  contentFingerprint: z.string().optional(),
  sha1: z.string().optional(),
  chunkIndex: z.number().int().positive().optional(),
  totalChunks: z.number().int().positive().optional(),
  sizeBytes: z.number().optional(),
  meta: z.object({
    chunk_index: z.number().int().positive().optional(),
    total_chunks: z.number().int().positive().optional(),
    size_bytes: z.number().optional(),
  }).optional(),
  embedding: z.array(z.number()).optional(),
  vector: z.array(z.number()).optional(),
  content_vector: z.array(z.number()).optional(),
});

type CorpusLine = z.infer<typeof CorpusLineSchema>;

export interface CorpusReadResult {
  records: CorpusRecord[];
  malformed: number;
}

function firstText(...values: Array<string | undefined>): string {
  for (const value of values) {
    if (value && value.trim().length > 0) {
      return value;
    }
  }
  return '';
}

function toSourceType(raw: string | undefined): SourceType {
  return raw === 'web-page' || raw === 'web' ? 'web-page' : 'document-file';
}

function chunkIndexFromId(id: string): number | undefined {
  const match = /(?:#|_)(\d+)$/.exec(id);
  return match?.[1] ? Number(match[1]) : undefined;
}

function toRecord(line: CorpusLine): CorpusRecord {
  const id = line.id === undefined ? '' : String(line.id);
  const chunkIndex = line.chunkIndex ?? line.meta?.chunk_index ?? chunkIndexFromId(id) ?? 1;
  const sourceLocator = line.sourceLocator ?? line.path ?? line.source ?? '';

  const record: CorpusRecord = {
    id,
    sourceType: toSourceType(line.sourceType ?? line.source_type),
    sourceLocator,
    fileName: line.fileName ?? line.file_name ?? path.basename(sourceLocator),
    fileType: line.fileType ?? line.file_type ?? path.extname(sourceLocator),
    text: firstText(line.text, line.content, line.page_content, line.chunk),
    contentFingerprint: line.contentFingerprint ?? line.sha1 ?? '',
    chunkIndex,
    totalChunks: line.totalChunks ?? line.meta?.total_chunks ?? chunkIndex,
  };

  const page = line.page ?? line.page_number;
  if (page !== undefined) record.page = page;
  if (line.title) record.title = line.title;

  const sizeBytes = line.sizeBytes ?? line.meta?.size_bytes;
  if (sizeBytes !== undefined) record.sizeBytes = sizeBytes;

  const embedding = line.embedding ?? line.vector ?? line.content_vector;
  if (embedding && embedding.length > 0) record.embedding = embedding;

  return record;
}

/**
 * Parse one corpus line; null when it is not valid JSON, not a record, or
 * has no id or no text.
 */
export function parseCorpusLine(line: string): CorpusRecord | null {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return null;
  }

  const result = CorpusLineSchema.safeParse(data);
  if (!result.success) {
    return null;
  }
  const record = toRecord(result.data);
  return record.id && record.text ? record : null;
}

/**
 * Read a newline-delimited JSON corpus. Malformed lines are skipped and
 * counted. A missing file reads as empty unless `required` is set.
 */
export async function readCorpus(filePath: string, options: { required?: boolean } = {}): Promise<CorpusReadResult> {
  if (!existsSync(filePath)) {
    if (options.required) {
      throw new FileError(`Corpus file not found: ${filePath}`);
    }
    return { records: [], malformed: 0 };
  }

  const records: CorpusRecord[] = [];
  let malformed = 0;

  const lines = createInterface({
    input: createReadStream(filePath, { encoding: 'utf-8' }),
    crlfDelay: Infinity,
  });

  for await (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    const record = parseCorpusLine(line);
    if (record) {
      records.push(record);
    } else {
      malformed++;
    }
  }

  return { records, malformed };
}

/**
 * Write records as JSONL through a temporary file renamed into place, so a
 * reader never sees a half-written corpus.
 */
export async function writeCorpus(filePath: string, records: Iterable<CorpusRecord>): Promise<number> {
  const tempPath = `${filePath}.tmp`;
  let written = 0;
  const lines: string[] = [];

  for (const record of records) {
    lines.push(JSON.stringify(record));
    written++;
  }

  try {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(tempPath, lines.length > 0 ? lines.join('\n') + '\n' : '', 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    throw new FileError(`Failed to write corpus ${filePath}: ${String(error)}`);
  }

  return written;
}
