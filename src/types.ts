/**
 * Shared types for the exam engine.
 *
 * Questions are read from the bank, projected to an answer-free client view,
 * and their canonical answers travel inside the signed session token until
 * the submission is graded.
 */

// =============================================================================
// Questions
// =============================================================================

/** Question kinds as stored in the bank and emitted to clients */
export type QuestionKind = 'single' | 'multiple';

/**
 * Canonical correct answer.
 * Multiple-choice values are trimmed, de-duplicated and sorted, so two
 * canonical answers are equal exactly when their encodings are equal.
 */
export type CanonicalAnswer =
  | { kind: 'single'; value: string }
  | { kind: 'multiple'; values: string[] };

/** A question record owned by the question bank */
export interface Question {
  id: number;
  kind: QuestionKind;
  /** Prompt text */
  content: string;
  /** Option strings; order is significant and shown verbatim */
  options: string[];
  answer: CanonicalAnswer;
  explanation: string | null;
}

/** Client view of a question. Never carries the answer. */
export interface PublicQuestion {
  id: number;
  type: QuestionKind;
  content: string;
  options: string[];
}

// =============================================================================
// Sessions
// =============================================================================

export type ExamPurpose = 'qualification' | 'practice';

/** Question id → canonical answer, in the order the questions were shown */
export type AnswerKey = Map<number, CanonicalAnswer>;

/** Decoded content of a session token */
export interface ExamSession {
  /** User the session was issued to; null for anonymous practice */
  subjectId: string | null;
  purpose: ExamPurpose;
  answerKey: AnswerKey;
  /** Unix seconds */
  issuedAt: number;
  /** Unix seconds */
  expiresAt: number;
}

// =============================================================================
// Grading and results
// =============================================================================

/** A single submitted answer: one value, or a set of values for multiple-choice */
export type SubmittedAnswer = string | string[];

/** Submitted answers keyed by question id (as a string) */
export type Submission = Record<string, SubmittedAnswer>;

export interface GradeResult {
  correctCount: number;
  totalCount: number;
  /** 0-100, two decimals */
  percentage: number;
  /** Only decided for qualification exams */
  passed: boolean | null;
}

/** One row per subject; the latest attempt overwrites the previous one */
export interface QualificationRecord {
  subjectId: string;
  score: number;
  correctCount: number;
  totalCount: number;
  passed: boolean;
  submittedAt: Date;
}

/** Append-only practice result */
export interface PracticeAttempt {
  id: number;
  subjectId: string;
  score: number;
  correctCount: number;
  totalCount: number;
  createdAt: Date;
}

export interface LeaderboardEntry {
  username: string;
  score: number;
  createdAt: Date;
}
