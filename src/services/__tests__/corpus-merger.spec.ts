import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CorpusMerger } from '../corpus-merger.js';
import { dedupe } from '../deduplicator.js';
import { writeCorpus } from '../../utils/corpus-file.js';
import { makeRecord } from '../../__tests__/fixtures.js';

describe('CorpusMerger', () => {
  const merger = new CorpusMerger();

  it('concatenates streams and drops later duplicates', () => {
    const a = makeRecord({ id: 'a_1' });
    const b = makeRecord({ id: 'b_1', contentFingerprint: 'shared' });
    const bAgain = makeRecord({ id: 'web#1', sourceType: 'web-page', contentFingerprint: 'shared' });
    const c = makeRecord({ id: 'c_1' });

    expect(merger.merge([[a, b], null, [], [bAgain, c]])).toEqual([a, b, c]);
  });

  it('merging a stream with an empty one or with itself equals deduping it', () => {
    const stream = [
      makeRecord({ id: 'a_1' }),
      makeRecord({ id: 'a_2', contentFingerprint: 'fp-a_1' }),
      makeRecord({ id: 'b_1' }),
    ];

    expect(merger.merge([stream, []])).toEqual(dedupe(stream));
    expect(merger.merge([stream, stream])).toEqual(dedupe(stream));
    expect(dedupe(stream).map(r => r.id)).toEqual(['a_1', 'b_1']);
  });

  it('appends large streams without exhausting the call stack', () => {
    const large = Array.from({ length: 300000 }, (_, i) => makeRecord({ id: `r_${i}` }));

    expect(merger.merge([large])).toHaveLength(300000);
  });

  describe('mergeFiles', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ndis-merge-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('merges files in order, skipping missing inputs and malformed lines', async () => {
      const files = path.join(dir, 'files.jsonl');
      const web = path.join(dir, 'web.jsonl');
      const out = path.join(dir, 'combined.jsonl');

      await writeCorpus(files, [makeRecord({ id: 'a_1' }), makeRecord({ id: 'b_1', contentFingerprint: 'shared' })]);
      await fs.appendFile(files, 'not json\n');
      await writeCorpus(web, [
        makeRecord({ id: 'ex.org/#1', contentFingerprint: 'shared' }),
        makeRecord({ id: 'ex.org/#2' }),
      ]);

      const { records, stats } = await merger.mergeFiles([files, path.join(dir, 'missing.jsonl'), web], out);

      expect(records.map(r => r.id)).toEqual(['a_1', 'b_1', 'ex.org/#2']);
      expect(stats).toEqual({
        inputs: 3,
        inputsSkipped: 1,
        recordsRead: 4,
        malformed: 1,
        duplicates: 1,
        written: 3,
      });

      const written = (await fs.readFile(out, 'utf-8')).trim().split('\n');
      expect(written).toHaveLength(3);
    });

    it('counts lines without id or text as malformed', async () => {
      const file = path.join(dir, 'sparse.jsonl');
      await fs.writeFile(file, '{}\n{"id":"x_1"}\n{"text":"hello"}\n{"id":"y_1","text":"hello"}\n');

      const { records, stats } = await merger.mergeFiles([file]);

      expect(records.map(r => [r.id, r.text])).toEqual([['y_1', 'hello']]);
      expect(stats).toMatchObject({ recordsRead: 1, malformed: 3, duplicates: 0, written: 1 });
    });
  });
});
