import { describe, it, expect, vi } from 'vitest';
import { InsufficientQuestionsError } from './errors.js';
import { InMemoryQuestionBank, type QuestionBank } from './question-bank.js';
import {
  QuestionSelector,
  drawWithoutReplacement,
  toPublicQuestion,
  type RandomIndex,
} from './question-selector.js';
import type { Question, QuestionKind } from './types.js';

function question(id: number, kind: QuestionKind = 'single'): Question {
  return {
    id,
    kind,
    content: `Question ${id}`,
    options: ['A', 'B', 'C', 'D'],
    answer: kind === 'single' ? { kind: 'single', value: 'A' } : { kind: 'multiple', values: ['A', 'B'] },
    explanation: null,
  };
}

function bankOf(count: number, kind: QuestionKind = 'single', firstId = 1): Question[] {
  return Array.from({ length: count }, (_, i) => question(firstId + i, kind));
}

const first: RandomIndex = () => 0;
const last: RandomIndex = max => max - 1;

describe('drawWithoutReplacement', () => {
  it('takes the first items when the random source always returns 0', () => {
    expect(drawWithoutReplacement([1, 2, 3, 4, 5], 3, first)).toEqual([1, 2, 3]);
  });

  it('swaps in the chosen item at each step', () => {
    // i=0 swaps with 4, i=1 swaps with 4 (holding 1 after the first swap)
    expect(drawWithoutReplacement([1, 2, 3, 4, 5], 2, last)).toEqual([5, 1]);
  });

  it('does not modify the pool', () => {
    const pool = [1, 2, 3];
    drawWithoutReplacement(pool, 3, last);
    expect(pool).toEqual([1, 2, 3]);
  });

  it('returns at most the pool size', () => {
    expect(drawWithoutReplacement([1, 2], 5, first)).toEqual([1, 2]);
  });

  it('asks the random source for a shrinking range', () => {
    const randomIndex = vi.fn<RandomIndex>(() => 0);
    drawWithoutReplacement([1, 2, 3, 4], 3, randomIndex);
    expect(randomIndex.mock.calls).toEqual([[4], [3], [2]]);
  });
});

describe('toPublicQuestion', () => {
  it('drops the answer and explanation and renames kind to type', () => {
    const q: Question = { ...question(9, 'multiple'), explanation: 'Because.' };
    expect(toPublicQuestion(q)).toEqual({
      id: 9,
      type: 'multiple',
      content: 'Question 9',
      options: ['A', 'B', 'C', 'D'],
    });
  });

  it('copies the options', () => {
    const q = question(1);
    const view = toPublicQuestion(q);
    view.options.push('E');
    expect(q.options).toEqual(['A', 'B', 'C', 'D']);
  });
});

describe('QuestionSelector', () => {
  it('selects the requested number of distinct questions', async () => {
    const selector = new QuestionSelector(new InMemoryQuestionBank(bankOf(20)));

    const selected = await selector.select([{ count: 5 }]);

    expect(selected).toHaveLength(5);
    expect(new Set(selected.map(q => q.id)).size).toBe(5);
    for (const q of selected) {
      expect(q.id).toBeGreaterThanOrEqual(1);
      expect(q.id).toBeLessThanOrEqual(20);
    }
  });

  it('can select the whole bank', async () => {
    const selector = new QuestionSelector(new InMemoryQuestionBank(bankOf(5)));
    const selected = await selector.select([{ count: 5 }]);
    expect(selected.map(q => q.id).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
  });

  it('is deterministic for a given random source', async () => {
    const selector = new QuestionSelector(new InMemoryQuestionBank(bankOf(6)), first);
    const selected = await selector.select([{ count: 3 }]);
    expect(selected.map(q => q.id)).toEqual([1, 2, 3]);
  });

  it('fails when the bank holds fewer questions than requested', async () => {
    const selector = new QuestionSelector(new InMemoryQuestionBank(bankOf(3)));

    await expect(selector.select([{ count: 5 }])).rejects.toThrow(InsufficientQuestionsError);
    await expect(selector.select([{ count: 5 }])).rejects.toMatchObject({
      requested: 5,
      available: 3,
      code: 'INSUFFICIENT_QUESTIONS',
    });
  });

  it('fills each kind-specific slot from that kind only', async () => {
    const bank = new InMemoryQuestionBank([
      ...bankOf(8, 'single', 1),
      ...bankOf(5, 'multiple', 101),
    ]);
    const selector = new QuestionSelector(bank);

    const selected = await selector.select([
      { kind: 'single', count: 6 },
      { kind: 'multiple', count: 4 },
    ]);

    expect(selected.slice(0, 6).every(q => q.kind === 'single')).toBe(true);
    expect(selected.slice(6).every(q => q.kind === 'multiple')).toBe(true);
    expect(selected).toHaveLength(10);
  });

  it('reports the kind that ran short', async () => {
    const bank = new InMemoryQuestionBank([
      ...bankOf(8, 'single', 1),
      ...bankOf(2, 'multiple', 101),
    ]);
    const selector = new QuestionSelector(bank);

    await expect(
      selector.select([
        { kind: 'single', count: 6 },
        { kind: 'multiple', count: 4 },
      ])
    ).rejects.toMatchObject({ requested: 4, available: 2, kind: 'multiple' });
  });

  it('fills kind-specific slots before an open slot', async () => {
    // Three singles and two multiples: the open slot must not use up the multiples
    const bank = new InMemoryQuestionBank([
      ...bankOf(3, 'single', 1),
      ...bankOf(2, 'multiple', 101),
    ]);
    const selector = new QuestionSelector(bank, first);

    const selected = await selector.select([
      { count: 3 },
      { kind: 'multiple', count: 2 },
    ]);

    expect(selected.map(q => q.id)).toEqual([1, 2, 3, 101, 102]);
  });

  it('asks the bank for each slot kind, kind-specific slots first', async () => {
    const bank = new InMemoryQuestionBank([
      ...bankOf(3, 'single', 1),
      ...bankOf(2, 'multiple', 101),
    ]);
    const listQuestions = vi.spyOn(bank, 'listQuestions');

    await new QuestionSelector(bank, first).select([
      { count: 3 },
      { kind: 'multiple', count: 2 },
    ]);

    expect(listQuestions.mock.calls).toEqual([['multiple'], [undefined]]);
  });

  it('never repeats a question across slots', async () => {
    const bank = new InMemoryQuestionBank([
      ...bankOf(4, 'single', 1),
      ...bankOf(4, 'multiple', 101),
    ]);
    const selector = new QuestionSelector(bank);

    const selected = await selector.select([
      { kind: 'single', count: 2 },
      { count: 6 },
    ]);

    expect(new Set(selected.map(q => q.id)).size).toBe(8);
  });

  it('skips empty slots', async () => {
    const selector = new QuestionSelector(new InMemoryQuestionBank(bankOf(4)));
    const selected = await selector.select([
      { kind: 'multiple', count: 0 },
      { kind: 'single', count: 2 },
    ]);
    expect(selected).toHaveLength(2);
  });

  it('keeps the first record when the bank repeats an id', async () => {
    const duplicate: Question = { ...question(1), content: 'Duplicate of 1' };
    const bank: QuestionBank = {
      listQuestions: async () => [question(1), duplicate, question(2)],
    };
    const selector = new QuestionSelector(bank, first);

    const selected = await selector.select([{ count: 2 }]);

    expect(selected.map(q => q.content)).toEqual(['Question 1', 'Question 2']);
    await expect(selector.select([{ count: 3 }])).rejects.toMatchObject({ available: 2 });
  });
});
