/**
 * Exam Service.
 *
 * Coordinates the selector, codec, grader and result store for both exam
 * purposes:
 * - qualification: authenticated, N random questions, one result row per user,
 *   a pass verifies the user
 * - practice: public to generate, fixed mix of question kinds, every
 *   submission appended to the leaderboard
 *
 * Nothing here holds per-session state; everything the submit step needs
 * comes back in the token.
 */

import type { ExamConfig } from './config.js';
import { AuthenticationError, SessionMismatchError } from './errors.js';
import { gradeSession } from './grader.js';
import type { QuestionSelector, SelectionPlan } from './question-selector.js';
import { toPublicQuestion } from './question-selector.js';
import type { ResultStore } from './result-store.js';
import type { SessionCodec } from './session-codec.js';
import type {
  AnswerKey,
  ExamPurpose,
  GradeResult,
  LeaderboardEntry,
  PublicQuestion,
  Submission,
} from './types.js';
import { ConsoleLogger } from './logger.js';

const logger = new ConsoleLogger('ExamService');

// =============================================================================
// Types
// =============================================================================

export interface GeneratedExam {
  questions: PublicQuestion[];
  examToken: string;
  /** Seconds until the token expires */
  expiresIn: number;
}

export interface SubmitExamInput {
  examToken: string;
  answers: Submission;
}

export interface QualificationOutcome {
  score: number;
  correctCount: number;
  totalQuestions: number;
  passed: boolean;
  message: string;
}

export interface PracticeOutcome {
  score: number;
  correctCount: number;
  totalQuestions: number;
  message: string;
}

export interface ExamServiceDeps {
  config: ExamConfig;
  selector: QuestionSelector;
  codec: SessionCodec;
  store: ResultStore;
  /** Milliseconds since epoch */
  clock?: () => number;
}

export const QUALIFICATION_PASSED_MESSAGE = 'Verification successful!';
export const QUALIFICATION_FAILED_MESSAGE = 'Score too low. Try again.';
export const PRACTICE_SUBMITTED_MESSAGE = 'Exam submitted successfully';

// =============================================================================
// Exam Service
// =============================================================================

export class ExamService {
  private readonly config: ExamConfig;
  private readonly selector: QuestionSelector;
  private readonly codec: SessionCodec;
  private readonly store: ResultStore;
  private readonly clock: () => number;

  constructor(deps: ExamServiceDeps) {
    this.config = deps.config;
    this.selector = deps.selector;
    this.codec = deps.codec;
    this.store = deps.store;
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Selection plan for a purpose.
   */
  planFor(purpose: ExamPurpose): SelectionPlan {
    if (purpose === 'qualification') {
      return [{ count: this.config.qualificationQuestionCount }];
    }
    return [
      { kind: 'single', count: this.config.practiceSingleCount },
      { kind: 'multiple', count: this.config.practiceMultipleCount },
    ];
  }

  /**
   * Draw a question set and seal its answer key into a session token.
   *
   * @param purpose - Exam purpose
   * @param subjectId - Authenticated user, or null (practice only)
   * @throws AuthenticationError if a qualification exam is requested anonymously
   * @throws InsufficientQuestionsError if the bank is too small
   */
  async generate(purpose: ExamPurpose, subjectId: string | null): Promise<GeneratedExam> {
    if (purpose === 'qualification' && !subjectId) {
      throw new AuthenticationError('Qualification exams require a logged-in user');
    }

    const questions = await this.selector.select(this.planFor(purpose));

    const answerKey: AnswerKey = new Map();
    for (const question of questions) {
      answerKey.set(question.id, question.answer);
    }

    const { token } = this.codec.encode(
      { subjectId, purpose, answerKey },
      this.config.sessionTtlSeconds,
      this.clock()
    );

    logger.debug(
      `Issued ${purpose} session with ${questions.length} questions to ${subjectId ?? 'anonymous'}`
    );

    return {
      questions: questions.map(toPublicQuestion),
      examToken: token,
      expiresIn: this.config.sessionTtlSeconds,
    };
  }

  /**
   * Verify, grade and record a qualification submission.
   *
   * @throws MalformedTokenError | InvalidSignatureError | ExpiredTokenError if the token does not verify
   * @throws SessionMismatchError if the token belongs to another user or purpose
   * @throws PersistenceFailedError if the result could not be saved
   */
  async submitQualification(subjectId: string, input: SubmitExamInput): Promise<QualificationOutcome> {
    const result = this.verifyAndGrade('qualification', subjectId, input);
    const passed = result.passed === true;

    await this.store.recordQualification(subjectId, result);

    return {
      score: result.percentage,
      correctCount: result.correctCount,
      totalQuestions: result.totalCount,
      passed,
      message: passed ? QUALIFICATION_PASSED_MESSAGE : QUALIFICATION_FAILED_MESSAGE,
    };
  }

  /**
   * Verify, grade and record a practice submission.
   *
   * @throws MalformedTokenError | InvalidSignatureError | ExpiredTokenError if the token does not verify
   * @throws SessionMismatchError if the token was issued to another user or purpose
   * @throws PersistenceFailedError if the result could not be saved
   */
  async submitPractice(subjectId: string, input: SubmitExamInput): Promise<PracticeOutcome> {
    const result = this.verifyAndGrade('practice', subjectId, input);

    await this.store.recordPractice(subjectId, result);

    return {
      score: result.percentage,
      correctCount: result.correctCount,
      totalQuestions: result.totalCount,
      message: PRACTICE_SUBMITTED_MESSAGE,
    };
  }

  /**
   * Current leaderboard.
   */
  async leaderboard(): Promise<LeaderboardEntry[]> {
    return this.store.leaderboard(this.config.leaderboardSize);
  }

  private verifyAndGrade(purpose: ExamPurpose, subjectId: string, input: SubmitExamInput): GradeResult {
    const session = this.codec.decode(input.examToken, this.clock());

    if (session.purpose !== purpose) {
      throw new SessionMismatchError(`Token was issued for a ${session.purpose} exam, not ${purpose}`);
    }

    // Anonymous practice sessions may be submitted by whoever logs in
    if (session.subjectId !== null && session.subjectId !== subjectId) {
      logger.warn(`User ${subjectId} submitted a session issued to ${session.subjectId}`);
      throw new SessionMismatchError('Token was issued to another user');
    }

    const result = gradeSession(session, input.answers, {
      policy: this.config.grading,
      passingScorePercentage: this.config.passingScorePercentage,
    });

    logger.info(
      `Graded ${purpose} for user ${subjectId}: ${result.correctCount}/${result.totalCount} (${result.percentage}%)`
    );

    return result;
  }
}
