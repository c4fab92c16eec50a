/**
 * Result Store - persistence of graded exams.
 *
 * Qualification results are one row per user: a new attempt replaces the old
 * one in a single atomic upsert, so two concurrent submissions leave exactly
 * one row holding one of the two attempts. Practice results are appended to
 * the leaderboard; many entries per user are expected.
 *
 * Any storage failure surfaces as PersistenceFailedError. Callers may retry
 * with the same GradeResult; both writes are safe to repeat.
 */

import { z } from 'zod';
import type { Queryable } from './db.js';
import { PersistenceFailedError, toError } from './errors.js';
import type { GradeResult, LeaderboardEntry, PracticeAttempt, QualificationRecord } from './types.js';
import type { UserDirectory } from './user-directory.js';
import { ConsoleLogger } from './logger.js';

const logger = new ConsoleLogger('ResultStore');

/** Display name for leaderboard entries whose user no longer resolves */
export const UNKNOWN_USERNAME = 'ghost';

// =============================================================================
// Repository Interface
// =============================================================================

export type NewPracticeAttempt = Omit<PracticeAttempt, 'id'>;

export interface ResultRepository {
  /** Insert or replace the subject's row in one atomic statement */
  upsertQualification(record: QualificationRecord): Promise<QualificationRecord>;
  findQualification(subjectId: string): Promise<QualificationRecord | null>;
  insertPracticeAttempt(attempt: NewPracticeAttempt): Promise<PracticeAttempt>;
  /** Highest scores first; ties go to the earlier attempt */
  listTopPracticeAttempts(limit: number): Promise<PracticeAttempt[]>;
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

function compareAttempts(a: PracticeAttempt, b: PracticeAttempt): number {
  return (
    b.score - a.score ||
    a.createdAt.getTime() - b.createdAt.getTime() ||
    a.id - b.id
  );
}

/**
 * In-memory repository for tests and dev mode.
 * Each write is a single synchronous Map operation, so it is atomic with
 * respect to other requests on the event loop.
 */
export class InMemoryResultRepository implements ResultRepository {
  private readonly qualifications = new Map<string, QualificationRecord>();
  private readonly attempts: PracticeAttempt[] = [];
  private nextAttemptId = 1;

  async upsertQualification(record: QualificationRecord): Promise<QualificationRecord> {
    const stored = { ...record };
    this.qualifications.set(record.subjectId, stored);
    return { ...stored };
  }

  async findQualification(subjectId: string): Promise<QualificationRecord | null> {
    const record = this.qualifications.get(subjectId);
    return record ? { ...record } : null;
  }

  async insertPracticeAttempt(attempt: NewPracticeAttempt): Promise<PracticeAttempt> {
    const stored: PracticeAttempt = { id: this.nextAttemptId++, ...attempt };
    this.attempts.push(stored);
    return { ...stored };
  }

  async listTopPracticeAttempts(limit: number): Promise<PracticeAttempt[]> {
    return [...this.attempts]
      .sort(compareAttempts)
      .slice(0, limit)
      .map(attempt => ({ ...attempt }));
  }

  /**
   * Get stats for debugging/monitoring.
   */
  getStats(): { qualificationCount: number; practiceCount: number } {
    return {
      qualificationCount: this.qualifications.size,
      practiceCount: this.attempts.length,
    };
  }
}

// =============================================================================
// PostgreSQL Implementation
// =============================================================================

const qualificationRowSchema = z.object({
  user_id: z.coerce.string(),
  score: z.coerce.number(),
  correct_count: z.coerce.number().int(),
  total_questions: z.coerce.number().int(),
  passed: z.boolean(),
  submitted_at: z.coerce.date(),
});

const practiceRowSchema = z.object({
  id: z.coerce.number().int(),
  user_id: z.coerce.string(),
  score: z.coerce.number(),
  correct_count: z.coerce.number().int(),
  total_questions: z.coerce.number().int(),
  created_at: z.coerce.date(),
});

function toQualificationRecord(raw: unknown): QualificationRecord {
  const row = qualificationRowSchema.parse(raw);
  return {
    subjectId: row.user_id,
    score: row.score,
    correctCount: row.correct_count,
    totalCount: row.total_questions,
    passed: row.passed,
    submittedAt: row.submitted_at,
  };
}

function toPracticeAttempt(raw: unknown): PracticeAttempt {
  const row = practiceRowSchema.parse(raw);
  return {
    id: row.id,
    subjectId: row.user_id,
    score: row.score,
    correctCount: row.correct_count,
    totalCount: row.total_questions,
    createdAt: row.created_at,
  };
}

const QUALIFICATION_COLUMNS = 'user_id, score, correct_count, total_questions, passed, submitted_at';
const PRACTICE_COLUMNS = 'id, user_id, score, correct_count, total_questions, created_at';

/**
 * Repository backed by the `qualification_records` and `leaderboard_entries`
 * tables (see sql/schema.sql).
 */
export class PostgresResultRepository implements ResultRepository {
  constructor(private readonly db: Queryable) {}

  async upsertQualification(record: QualificationRecord): Promise<QualificationRecord> {
    // One conditional write; whichever concurrent statement commits last wins
    const result = await this.db.query(
      `INSERT INTO qualification_records (${QUALIFICATION_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (user_id) DO UPDATE SET
         score = EXCLUDED.score,
         correct_count = EXCLUDED.correct_count,
         total_questions = EXCLUDED.total_questions,
         passed = EXCLUDED.passed,
         submitted_at = EXCLUDED.submitted_at
       RETURNING ${QUALIFICATION_COLUMNS}`,
      [
        record.subjectId,
        record.score,
        record.correctCount,
        record.totalCount,
        record.passed,
        record.submittedAt,
      ]
    );

    if (result.rows.length !== 1) {
      throw new Error(`Qualification upsert returned ${result.rows.length} rows`);
    }
    return toQualificationRecord(result.rows[0]);
  }

  async findQualification(subjectId: string): Promise<QualificationRecord | null> {
    const result = await this.db.query(
      `SELECT ${QUALIFICATION_COLUMNS} FROM qualification_records WHERE user_id = $1`,
      [subjectId]
    );
    return result.rows.length > 0 ? toQualificationRecord(result.rows[0]) : null;
  }

  async insertPracticeAttempt(attempt: NewPracticeAttempt): Promise<PracticeAttempt> {
    const result = await this.db.query(
      `INSERT INTO leaderboard_entries (user_id, score, correct_count, total_questions, created_at)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${PRACTICE_COLUMNS}`,
      [attempt.subjectId, attempt.score, attempt.correctCount, attempt.totalCount, attempt.createdAt]
    );

    if (result.rows.length !== 1) {
      throw new Error(`Practice insert returned ${result.rows.length} rows`);
    }
    return toPracticeAttempt(result.rows[0]);
  }

  async listTopPracticeAttempts(limit: number): Promise<PracticeAttempt[]> {
    const result = await this.db.query(
      `SELECT ${PRACTICE_COLUMNS} FROM leaderboard_entries
       ORDER BY score DESC, created_at ASC, id ASC
       LIMIT $1`,
      [limit]
    );
    return result.rows.map(toPracticeAttempt);
  }
}

// =============================================================================
// Result Store
// =============================================================================

export class ResultStore {
  constructor(
    private readonly repository: ResultRepository,
    private readonly directory: UserDirectory,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Save a qualification result, replacing the subject's previous one.
   *
   * A pass marks the user verified. A later failing attempt overwrites the
   * score but leaves verification in place.
   *
   * @throws PersistenceFailedError if the row or the verification flag could not be written
   */
  async recordQualification(subjectId: string, result: GradeResult): Promise<QualificationRecord> {
    if (result.passed === null) {
      throw new Error('Qualification results must carry a pass decision');
    }

    let record: QualificationRecord;
    try {
      record = await this.repository.upsertQualification({
        subjectId,
        score: result.percentage,
        correctCount: result.correctCount,
        totalCount: result.totalCount,
        passed: result.passed,
        submittedAt: this.clock(),
      });
    } catch (err) {
      logger.error(`Failed to save qualification for user ${subjectId}`, err);
      throw new PersistenceFailedError(`Failed to save qualification result for user ${subjectId}`, toError(err));
    }

    if (result.passed) {
      try {
        await this.directory.markVerified(subjectId);
      } catch (err) {
        logger.error(`Failed to mark user ${subjectId} verified`, err);
        throw new PersistenceFailedError(`Failed to mark user ${subjectId} verified`, toError(err));
      }
      logger.info(`User ${subjectId} passed qualification (${result.percentage}%) and is verified`);
    }

    return record;
  }

  /**
   * Append a practice result to the leaderboard.
   *
   * @throws PersistenceFailedError if the entry could not be written
   */
  async recordPractice(subjectId: string, result: GradeResult): Promise<PracticeAttempt> {
    try {
      return await this.repository.insertPracticeAttempt({
        subjectId,
        score: result.percentage,
        correctCount: result.correctCount,
        totalCount: result.totalCount,
        createdAt: this.clock(),
      });
    } catch (err) {
      logger.error(`Failed to save practice result for user ${subjectId}`, err);
      throw new PersistenceFailedError(`Failed to save practice result for user ${subjectId}`, toError(err));
    }
  }

  async findQualification(subjectId: string): Promise<QualificationRecord | null> {
    try {
      return await this.repository.findQualification(subjectId);
    } catch (err) {
      throw new PersistenceFailedError(`Failed to load qualification for user ${subjectId}`, toError(err));
    }
  }

  /**
   * Top practice results with usernames.
   */
  async leaderboard(limit: number): Promise<LeaderboardEntry[]> {
    try {
      const attempts = await this.repository.listTopPracticeAttempts(limit);
      const names = await this.directory.resolveUsernames(attempts.map(a => a.subjectId));

      return attempts.map(attempt => ({
        username: names.get(attempt.subjectId) ?? UNKNOWN_USERNAME,
        score: attempt.score,
        createdAt: attempt.createdAt,
      }));
    } catch (err) {
      logger.error('Failed to load leaderboard', err);
      throw new PersistenceFailedError('Failed to load leaderboard', toError(err));
    }
  }
}
