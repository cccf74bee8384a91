import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { parseCorpusLine, readCorpus, writeCorpus } from '../corpus-file.js';
import { FileError } from '../errors.js';
import { makeRecord } from '../../__tests__/fixtures.js';

describe('parseCorpusLine', () => {
  it('folds legacy field names into a record', () => {
    const record = parseCorpusLine('{"id":"a_2","path":"/x/a.pdf","content":"hello","sha1":"abc","page":"3"}');

    expect(record).toEqual({
      id: 'a_2',
      sourceType: 'document-file',
      sourceLocator: '/x/a.pdf',
      fileName: 'a.pdf',
      fileType: '.pdf',
      text: 'hello',
      contentFingerprint: 'abc',
      chunkIndex: 2,
      totalChunks: 2,
      page: 3,
    });
  });

  it('reads web records and chunk metadata', () => {
    const record = parseCorpusLine(JSON.stringify({
      id: 'ex.org/a#3',
      source_type: 'web',
      source: 'https://ex.org/a',
      text: 't',
      meta: { total_chunks: 4 },
      content_vector: [0.5, 0.25],
    }));

    expect(record).toMatchObject({
      sourceType: 'web-page',
      sourceLocator: 'https://ex.org/a',
      chunkIndex: 3,
      totalChunks: 4,
      embedding: [0.5, 0.25],
    });
  });

  it('returns null for lines that are not records', () => {
    expect(parseCorpusLine('not json')).toBeNull();
    expect(parseCorpusLine('[1, 2]')).toBeNull();
    expect(parseCorpusLine('{"text": 5}')).toBeNull();
    expect(parseCorpusLine('{}')).toBeNull();
    expect(parseCorpusLine('{"id":"x"}')).toBeNull();
    expect(parseCorpusLine('{"text":"hello"}')).toBeNull();
    expect(parseCorpusLine('{"id":"x","content":"   "}')).toBeNull();
  });
});

describe('readCorpus / writeCorpus', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ndis-corpus-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('skips blank lines and counts malformed ones', async () => {
    const file = path.join(dir, 'in.jsonl');
    await fs.writeFile(file, '{"id":"a_1","text":"one"}\n\n{broken\n{"id":"b_1","text":"two"}\n');

    const { records, malformed } = await readCorpus(file);

    expect(records.map(r => r.id)).toEqual(['a_1', 'b_1']);
    expect(malformed).toBe(1);
  });

  it('treats a missing file as empty unless required', async () => {
    const missing = path.join(dir, 'missing.jsonl');

    await expect(readCorpus(missing)).resolves.toEqual({ records: [], malformed: 0 });
    await expect(readCorpus(missing, { required: true })).rejects.toBeInstanceOf(FileError);
  });

  it('writes one JSON object per line and creates the directory', async () => {
    const file = path.join(dir, 'nested', 'out.jsonl');
    const records = [makeRecord({ id: 'a_1' }), makeRecord({ id: 'b_1', page: 2 })];

    await expect(writeCorpus(file, records)).resolves.toBe(2);

    const lines = (await fs.readFile(file, 'utf-8')).split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[1] ?? '')).toEqual(records[1]);
    expect((await readCorpus(file)).records).toEqual(records);
  });
});
