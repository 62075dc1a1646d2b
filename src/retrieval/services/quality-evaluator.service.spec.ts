import {
  QualityEvaluatorService,
  truncatePreview,
} from './quality-evaluator.service';
import { ScriptedChat, testOptions } from '../testing/fakes';
import type { Query } from '../types';

describe('QualityEvaluatorService', () => {
  const query: Query = Object.freeze({ text: 'refund policy', topK: 5 });
  let chat: ScriptedChat;
  let evaluator: QualityEvaluatorService;

  beforeEach(() => {
    chat = new ScriptedChat();
    evaluator = new QualityEvaluatorService(chat, testOptions());
  });

  it('returns the judge verdict', async () => {
    chat.script('quality', {
      score: 0.8,
      isAdequate: true,
      suggestedAction: 'proceed',
      reasoning: 'covers refunds',
    });

    await expect(
      evaluator.evaluate(query, ['Refunds are issued within 14 days.'], 1),
    ).resolves.toEqual({
      score: 0.8,
      isAdequate: true,
      suggestedAction: 'proceed',
      reasoning: 'covers refunds',
      degraded: false,
    });
  });

  it('numbers and truncates passages before sending them', async () => {
    chat.script('quality', {
      score: 0.4,
      isAdequate: false,
      suggestedAction: 'reformulate',
    });

    await evaluator.evaluate(query, ['y'.repeat(400), 'short one'], 2);

    expect(chat.calls[0].user).toBe(
      `Query: "refund policy"\nAttempt: 2\n\nPassages:\n[1] ${'y'.repeat(300)}...\n\n[2] short one`,
    );
  });

  it('fails open when the judge is unreachable', async () => {
    chat.script('quality', new Error('timeout'));

    const evaluation = await evaluator.evaluate(query, ['text'], 1);

    expect(evaluation).toEqual({
      score: 1,
      isAdequate: true,
      suggestedAction: 'proceed',
      reasoning: 'Quality judge unavailable (timeout)',
      degraded: true,
    });
  });

  it('fails open on an out-of-range score', async () => {
    chat.script('quality', {
      score: 1.4,
      isAdequate: false,
      suggestedAction: 'expand',
      reasoning: '',
    });

    const evaluation = await evaluator.evaluate(query, ['text'], 1);

    expect(evaluation.degraded).toBe(true);
    expect(evaluation.suggestedAction).toBe('proceed');
  });

  it('does not call the judge for an empty set', async () => {
    const evaluation = await evaluator.evaluate(query, [], 1);

    expect(chat.calls).toHaveLength(0);
    expect(evaluation.isAdequate).toBe(false);
    expect(evaluation.score).toBe(0);
    expect(evaluation.suggestedAction).toBe('expand');
  });
});

describe('truncatePreview', () => {
  it('only marks text that was cut', () => {
    expect(truncatePreview('abcdef', 3)).toBe('abc...');
    expect(truncatePreview('abc', 3)).toBe('abc');
  });
});
