/**
 * Question Bank - read-only access to question records.
 *
 * Questions are authored elsewhere (the admin screens) with the field name
 * `question_type`; this module accepts that naming at the boundary and turns
 * each record into a `Question` with a canonical answer. The client-facing
 * name `type` is produced by the selector.
 *
 * Implementations:
 * - InMemoryQuestionBank: tests and dev mode (seeded from a JSON file)
 * - PostgresQuestionBank: the platform's `questions` table
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Queryable } from './db.js';
import { ValidationError } from './errors.js';
import type { CanonicalAnswer, Question, QuestionKind } from './types.js';
import { ConsoleLogger } from './logger.js';

const logger = new ConsoleLogger('QuestionBank');

// =============================================================================
// Interface
// =============================================================================

export interface QuestionBank {
  /**
   * List questions, optionally restricted to one kind.
   */
  listQuestions(kind?: QuestionKind): Promise<Question[]>;
}

// =============================================================================
// Authoring boundary
// =============================================================================

const questionKindSchema = z.enum(['single', 'multiple']);

/** Question payload as written by the authoring screens */
export const authoredQuestionSchema = z.object({
  id: z.number().int().positive(),
  question_type: questionKindSchema,
  content: z.string().trim().min(1),
  options: z.array(z.string()).min(2),
  answer: z.union([z.string(), z.array(z.string())]),
  analysis: z.string().nullish(),
});

export type AuthoredQuestion = z.input<typeof authoredQuestionSchema>;

/**
 * Split a multiple-choice answer ("A,B" or ["A", "B"]) into its
 * trimmed, de-duplicated, sorted values.
 */
export function normalizeAnswerSet(answer: string | readonly string[]): string[] {
  const parts = typeof answer === 'string' ? answer.split(',') : answer;
  const values = new Set<string>();
  for (const part of parts) {
    const value = part.trim();
    if (value) {
      values.add(value);
    }
  }
  return Array.from(values).sort();
}

/**
 * Build the canonical answer for a question kind.
 *
 * @throws ValidationError if the answer is empty or has the wrong shape
 */
export function toCanonicalAnswer(
  kind: QuestionKind,
  answer: string | readonly string[]
): CanonicalAnswer {
  if (kind === 'single') {
    if (typeof answer !== 'string') {
      throw new ValidationError('single-choice answer must be one value', 'answer');
    }
    const value = answer.trim();
    if (!value) {
      throw new ValidationError('answer cannot be empty', 'answer');
    }
    return { kind: 'single', value };
  }

  const values = normalizeAnswerSet(answer);
  if (values.length === 0) {
    throw new ValidationError('answer cannot be empty', 'answer');
  }
  return { kind: 'multiple', values };
}

/**
 * Parse an authored question record into a Question.
 *
 * @throws ValidationError if the record does not match the authoring schema
 */
export function parseAuthoredQuestion(raw: unknown): Question {
  const parsed = authoredQuestionSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue.message, issue.path.join('.') || undefined);
  }

  const record = parsed.data;
  return {
    id: record.id,
    kind: record.question_type,
    content: record.content,
    options: record.options,
    answer: toCanonicalAnswer(record.question_type, record.answer),
    explanation: record.analysis ?? null,
  };
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

/**
 * In-memory question bank.
 * Later records with an id already present replace the earlier one.
 */
export class InMemoryQuestionBank implements QuestionBank {
  private readonly questions = new Map<number, Question>();

  constructor(questions: readonly Question[] = []) {
    for (const question of questions) {
      this.questions.set(question.id, question);
    }
  }

  async listQuestions(kind?: QuestionKind): Promise<Question[]> {
    const all = Array.from(this.questions.values());
    return kind ? all.filter(q => q.kind === kind) : all;
  }

  get size(): number {
    return this.questions.size;
  }
}

/**
 * Load an in-memory bank from a JSON file holding an array of authored questions.
 */
export async function loadQuestionFile(filePath: string): Promise<InMemoryQuestionBank> {
  const data = await readFile(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(data);

  if (!Array.isArray(parsed)) {
    throw new ValidationError(`Question file ${filePath} must contain an array`);
  }

  const bank = new InMemoryQuestionBank(parsed.map(parseAuthoredQuestion));
  logger.info(`Loaded ${bank.size} questions from ${filePath}`);
  return bank;
}

// =============================================================================
// PostgreSQL Implementation
// =============================================================================

const questionRowSchema = z.object({
  id: z.coerce.number().int(),
  question_type: questionKindSchema,
  content: z.string(),
  // json column; pg parses it already
  options: z.array(z.string()),
  answer: z.string(),
  analysis: z.string().nullable(),
});

/**
 * Question bank backed by the `questions` table.
 */
export class PostgresQuestionBank implements QuestionBank {
  constructor(private readonly db: Queryable) {}

  async listQuestions(kind?: QuestionKind): Promise<Question[]> {
    const result = kind
      ? await this.db.query(
          `SELECT id, type AS question_type, content, options, answer, analysis
           FROM questions WHERE type = $1 ORDER BY id`,
          [kind]
        )
      : await this.db.query(
          `SELECT id, type AS question_type, content, options, answer, analysis
           FROM questions ORDER BY id`
        );

    const questions: Question[] = [];
    for (const raw of result.rows) {
      const row = questionRowSchema.safeParse(raw);
      if (!row.success) {
        logger.warn('Skipping unreadable question row', row.error.issues[0]?.message);
        continue;
      }
      try {
        questions.push({
          id: row.data.id,
          kind: row.data.question_type,
          content: row.data.content,
          options: row.data.options,
          answer: toCanonicalAnswer(row.data.question_type, row.data.answer),
          explanation: row.data.analysis,
        });
      } catch (err) {
        logger.warn(`Skipping question ${row.data.id}`, err instanceof Error ? err.message : err);
      }
    }
    return questions;
  }
}
