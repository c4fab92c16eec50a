/**
 * Grader - exact-match scoring of a submission against a verified session.
 *
 * Pure: the same session and submission always give the same result.
 */

import type { CanonicalAnswer, ExamSession, GradeResult, Submission, SubmittedAnswer } from './types.js';

/**
 * How strings are compared.
 */
export interface GradingPolicy {
  /** "Ming" and "ming" are different answers when true */
  caseSensitive: boolean;
  /** Strip surrounding whitespace from every value before comparing */
  trimWhitespace: boolean;
}

export interface GradeOptions {
  policy: GradingPolicy;
  /** 0-100; compared against the unrounded ratio */
  passingScorePercentage: number;
}

function normalizeValue(value: string, policy: GradingPolicy): string {
  const trimmed = policy.trimWhitespace ? value.trim() : value;
  return policy.caseSensitive ? trimmed : trimmed.toLowerCase();
}

function normalizeSet(values: readonly string[], policy: GradingPolicy): Set<string> {
  const set = new Set<string>();
  for (const value of values) {
    const normalized = normalizeValue(value, policy);
    // Empty entries come from trailing commas and blank selections
    if (normalized.trim()) {
      set.add(normalized);
    }
  }
  return set;
}

/**
 * Compare one submitted answer with the canonical answer.
 */
export function isAnswerCorrect(
  expected: CanonicalAnswer,
  submitted: SubmittedAnswer | undefined,
  policy: GradingPolicy
): boolean {
  if (submitted === undefined) {
    return false;
  }

  if (expected.kind === 'single') {
    if (typeof submitted !== 'string') {
      return false;
    }
    return normalizeValue(submitted, policy) === normalizeValue(expected.value, policy);
  }

  const given = normalizeSet(typeof submitted === 'string' ? submitted.split(',') : submitted, policy);
  const wanted = normalizeSet(expected.values, policy);

  if (given.size !== wanted.size) {
    return false;
  }
  for (const value of wanted) {
    if (!given.has(value)) {
      return false;
    }
  }
  return true;
}

/**
 * Grade a submission.
 *
 * Every question in the session's key counts toward the total; a missing
 * answer is simply wrong. Answers for questions outside the key are ignored.
 */
export function gradeSession(
  session: ExamSession,
  submission: Submission,
  options: GradeOptions
): GradeResult {
  const totalCount = session.answerKey.size;
  let correctCount = 0;

  for (const [questionId, expected] of session.answerKey) {
    const key = String(questionId);
    const submitted = Object.hasOwn(submission, key) ? submission[key] : undefined;
    if (isAnswerCorrect(expected, submitted, options.policy)) {
      correctCount++;
    }
  }

  const percentage = totalCount === 0 ? 0 : Math.round((correctCount / totalCount) * 10000) / 100;

  return {
    correctCount,
    totalCount,
    percentage,
    passed:
      session.purpose === 'qualification'
        ? totalCount > 0 && correctCount * 100 >= options.passingScorePercentage * totalCount
        : null,
  };
}
