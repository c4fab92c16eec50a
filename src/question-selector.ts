/**
 * Question Selector - random, duplicate-free question sets.
 *
 * Draws uniformly without replacement (partial Fisher-Yates) using
 * `crypto.randomInt`.
 */

import { randomInt } from 'crypto';
import { InsufficientQuestionsError } from './errors.js';
import type { QuestionBank } from './question-bank.js';
import type { PublicQuestion, Question, QuestionKind } from './types.js';

/** Returns an integer in [0, maxExclusive) */
export type RandomIndex = (maxExclusive: number) => number;

/** One part of an exam: `count` questions, optionally of a single kind */
export interface SelectionSlot {
  kind?: QuestionKind;
  count: number;
}

export type SelectionPlan = readonly SelectionSlot[];

export const secureRandomIndex: RandomIndex = (maxExclusive) => randomInt(maxExclusive);

/**
 * Pick `count` items from `pool` without replacement.
 * The pool is not modified.
 */
export function drawWithoutReplacement<T>(
  pool: readonly T[],
  count: number,
  randomIndex: RandomIndex = secureRandomIndex
): T[] {
  const items = pool.slice();
  const n = Math.min(count, items.length);

  for (let i = 0; i < n; i++) {
    const j = i + randomIndex(items.length - i);
    [items[i], items[j]] = [items[j], items[i]];
  }

  return items.slice(0, n);
}

/**
 * Project a question to the client view. The answer and explanation stay behind.
 */
export function toPublicQuestion(question: Question): PublicQuestion {
  return {
    id: question.id,
    type: question.kind,
    content: question.content,
    options: [...question.options],
  };
}

// Collapse duplicate ids so a question can never be shown twice; first record wins
function uniqueById(questions: readonly Question[]): Question[] {
  const byId = new Map<number, Question>();
  for (const question of questions) {
    if (!byId.has(question.id)) {
      byId.set(question.id, question);
    }
  }
  return Array.from(byId.values());
}

export class QuestionSelector {
  constructor(
    private readonly bank: QuestionBank,
    private readonly randomIndex: RandomIndex = secureRandomIndex
  ) {}

  /**
   * Select questions for a plan.
   *
   * Each slot asks the bank only for its own kind. Slots restricted to a kind
   * are filled first so that an unrestricted slot cannot use up the questions
   * a kind-specific slot needs. Within a slot the order is random; slots keep
   * their plan order in the result.
   *
   * @throws InsufficientQuestionsError if any slot cannot be filled
   */
  async select(plan: SelectionPlan): Promise<Question[]> {
    const taken = new Set<number>();
    const drawn: Question[][] = plan.map(() => []);
    const order = plan
      .map((slot, index) => ({ slot, index }))
      .sort((a, b) => Number(a.slot.kind === undefined) - Number(b.slot.kind === undefined));

    for (const { slot, index } of order) {
      if (slot.count <= 0) {
        continue;
      }

      const candidates = uniqueById(await this.bank.listQuestions(slot.kind));
      const eligible = candidates.filter(
        q => !taken.has(q.id) && (slot.kind === undefined || q.kind === slot.kind)
      );

      if (eligible.length < slot.count) {
        throw new InsufficientQuestionsError(slot.count, eligible.length, slot.kind);
      }

      const picked = drawWithoutReplacement(eligible, slot.count, this.randomIndex);
      for (const question of picked) {
        taken.add(question.id);
      }
      drawn[index] = picked;
    }

    return drawn.flat();
  }
}
