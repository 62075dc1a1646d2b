import { toRankedResult, toRankedResults } from './qdrant-point.mapper';

describe('toRankedResult', () => {
  it('maps snake_case payload fields', () => {
    expect(
      toRankedResult(
        {
          id: 7,
          score: 0.9,
          payload: {
            text: 'Refunds are issued within 14 days.',
            document_id: 'doc-1',
            source: 'policies/refunds.md',
            page_number: 3,
            section_title: 'Refunds',
          },
        },
        'dense',
      ),
    ).toEqual({
      id: '7',
      text: 'Refunds are issued within 14 days.',
      source: {
        documentId: 'doc-1',
        sourcePath: 'policies/refunds.md',
        page: 3,
        section: 'Refunds',
      },
      score: 0.9,
      origin: 'dense',
    });
  });

  it('prefers the chunk id over the point id', () => {
    const result = toRankedResult(
      {
        id: 'a1b2',
        score: 2.5,
        payload: { content: 'text', chunkId: 'chunk-9', documentId: 'doc-2' },
      },
      'sparse',
    );

    expect(result?.id).toBe('chunk-9');
    expect(result?.source).toEqual({ documentId: 'doc-2', sourcePath: '' });
  });

  it('returns null for points without text', () => {
    expect(toRankedResult({ id: 1, score: 1, payload: null }, 'dense')).toBeNull();
    expect(
      toRankedResult({ id: 1, score: 1, payload: { text: '   ' } }, 'dense'),
    ).toBeNull();
  });
});

describe('toRankedResults', () => {
  it('drops text-less points and keeps order', () => {
    const results = toRankedResults(
      [
        { id: 1, score: 0.9, payload: { text: 'one' } },
        { id: 2, score: 0.8 },
        { id: 3, score: 0.7, payload: { text: 'three' } },
      ],
      'dense',
    );

    expect(results.map((result) => result.id)).toEqual(['1', '3']);
  });
});
