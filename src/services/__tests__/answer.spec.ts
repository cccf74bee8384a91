import { AnswerService } from '../answer.js';
import { IndexLifecycle } from '../index-lifecycle.js';
import { INSUFFICIENT_CONTEXT_ANSWER, systemPrompt, userPrompt } from '../prompts.js';
import { RetrievalRanker } from '../retrieval.js';
import { SqliteVectorStore } from '../vector-store.js';
import { FakeChatProvider, FakeEmbeddingProvider, NO_WAIT_RETRY } from '../../__tests__/fixtures.js';

describe('AnswerService', () => {
  let store: SqliteVectorStore;
  let ranker: RetrievalRanker;

  beforeEach(async () => {
    store = new SqliteVectorStore(':memory:').initialize();
    await new IndexLifecycle(store, { indexName: 'idx', dimensions: 3 }).ensureSchema();
    ranker = new RetrievalRanker(new FakeEmbeddingProvider(3), store, { indexName: 'idx', retry: NO_WAIT_RETRY });
  });

  afterEach(() => {
    store.close();
  });

  it('answers from the retrieved context', async () => {
    await store.uploadDocuments('idx', [
      { id: 'a', content: 'Reviews happen yearly.', source: 'https://ex.org/reviews', sourceType: 'web-page', title: 'Reviews', embedding: [1, 1, 0] },
    ]);
    const chat = new FakeChatProvider('  Reviews happen every year [1].  ');
    const service = new AnswerService(ranker, chat, { orgName: 'NDIS', retry: NO_WAIT_RETRY });

    const result = await service.answer(' When are reviews? ');

    expect(result).toEqual({
      answer: 'Reviews happen every year [1].',
      references: [{ number: 1, id: 'a', label: 'Reviews - https://ex.org/reviews', url: 'https://ex.org/reviews' }],
    });
    expect(chat.requests).toEqual([{
      messages: [
        { role: 'system', content: systemPrompt('NDIS') },
        {
          role: 'user',
          content: userPrompt('When are reviews?', '[1] Reviews happen yearly.\n(Source: Reviews - https://ex.org/reviews)'),
        },
      ],
      options: { temperature: 0.2, maxTokens: 400 },
    }]);
  });

  it('returns the fallback answer without calling chat when nothing is retrieved', async () => {
    const chat = new FakeChatProvider('should not be used');
    const service = new AnswerService(ranker, chat, { retry: NO_WAIT_RETRY });

    await expect(service.answer('anything')).resolves.toEqual({ answer: INSUFFICIENT_CONTEXT_ANSWER, references: [] });
    expect(chat.requests).toHaveLength(0);
  });
});

describe('prompts', () => {
  it('frames the question and context', () => {
    expect(userPrompt('Q?', '[1] C')).toBe('Question: Q?\n\nContext:\n[1] C');
  });

  it('names the organisation and emergency contacts', () => {
    const prompt = systemPrompt('NDIS');
    expect(prompt.startsWith('You are the NDIS Assistant')).toBe(true);
    expect(prompt).toContain('Lifeline on 13 11 14');
  });
});
