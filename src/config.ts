/**
 * Configuration loaded from environment variables
 *
 * Supports two modes:
 * - Production (DEV_MODE=false): Requires DATABASE_URL and JWT_SECRET, results go to PostgreSQL
 * - Development (DEV_MODE=true): In-memory stores seeded from a question file
 */

import { fileURLToPath } from 'url';
import type { GradingPolicy } from './grader.js';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Exam rules shared by the selector, codec, grader and result store */
export interface ExamConfig {
  /** Number of questions in a qualification exam */
  qualificationQuestionCount: number;
  /** Practice quiz composition by question kind */
  practiceSingleCount: number;
  practiceMultipleCount: number;
  /** Session token lifetime in seconds (default: 900 = 15 minutes) */
  sessionTtlSeconds: number;
  /** Minimum percentage for a qualification pass */
  passingScorePercentage: number;
  /** Entries returned by the leaderboard */
  leaderboardSize: number;
  grading: GradingPolicy;
}

export interface Config {
  /** Development mode - in-memory stores, default secrets */
  devMode: boolean;
  /** Port to listen on */
  port: number;
  /** Log level */
  logLevel: LogLevel;
  /** PostgreSQL connection string (required in production mode) */
  databaseUrl?: string;
  /** Secret used to verify login tokens */
  jwtSecret: string;
  /** Secret used to sign exam session tokens */
  examSigningKey: string;
  /** Question file loaded into the in-memory bank in dev mode */
  questionFile: string;
  exam: ExamConfig;
}

export const DEFAULT_EXAM_CONFIG: ExamConfig = {
  qualificationQuestionCount: 20,
  practiceSingleCount: 6,
  practiceMultipleCount: 4,
  sessionTtlSeconds: 900,
  passingScorePercentage: 60,
  leaderboardSize: 5,
  grading: {
    caseSensitive: true,
    trimWhitespace: true,
  },
};

const DEFAULT_QUESTION_FILE = fileURLToPath(new URL('../data/questions.json', import.meta.url));

function getEnvOrDefault(name: string, defaultValue: string): string {
  return process.env[name] ?? defaultValue;
}

function getIntEnv(name: string, defaultValue: number, min: number = 0): number {
  const raw = getEnvOrDefault(name, String(defaultValue));
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid value for ${name}: expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function getNumberEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = getEnvOrDefault(name, String(defaultValue));
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new Error(`Invalid value for ${name}: expected a number in [${min}, ${max}], got "${raw}"`);
  }
  return value;
}

function getBoolEnv(name: string, defaultValue: boolean): boolean {
  return getEnvOrDefault(name, String(defaultValue)).toLowerCase() === 'true';
}

function parseLogLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find(l => l === raw.toLowerCase());
  if (!level) {
    throw new Error(`Invalid LOG_LEVEL "${raw}" (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return level;
}

export function loadConfig(): Config {
  const devMode = getEnvOrDefault('DEV_MODE', 'false').toLowerCase() === 'true';

  // JWT secret: required in production, use default for dev
  const jwtSecret = process.env.JWT_SECRET ?? (devMode ? 'dev-jwt-secret-do-not-use-in-production' : '');
  if (!devMode && !jwtSecret) {
    throw new Error('Missing required environment variable: JWT_SECRET (required when DEV_MODE is not true)');
  }

  const databaseUrl = process.env.DATABASE_URL;
  if (!devMode && !databaseUrl) {
    throw new Error('Missing required environment variable: DATABASE_URL (required when DEV_MODE is not true)');
  }

  const practiceSingleCount = getIntEnv('PRACTICE_SINGLE_COUNT', DEFAULT_EXAM_CONFIG.practiceSingleCount);
  const practiceMultipleCount = getIntEnv('PRACTICE_MULTIPLE_COUNT', DEFAULT_EXAM_CONFIG.practiceMultipleCount);
  if (practiceSingleCount + practiceMultipleCount === 0) {
    throw new Error('PRACTICE_SINGLE_COUNT and PRACTICE_MULTIPLE_COUNT cannot both be 0');
  }

  return {
    devMode,
    port: getIntEnv('PORT', 8080, 0),
    logLevel: parseLogLevel(getEnvOrDefault('LOG_LEVEL', 'info')),
    databaseUrl,
    jwtSecret,
    examSigningKey: process.env.EXAM_SIGNING_KEY ?? jwtSecret,
    questionFile: getEnvOrDefault('QUESTION_FILE', DEFAULT_QUESTION_FILE),
    exam: {
      qualificationQuestionCount: getIntEnv('EXAM_QUESTION_COUNT', DEFAULT_EXAM_CONFIG.qualificationQuestionCount, 1),
      practiceSingleCount,
      practiceMultipleCount,
      sessionTtlSeconds: getIntEnv('EXAM_TTL_SECONDS', DEFAULT_EXAM_CONFIG.sessionTtlSeconds, 1),
      passingScorePercentage: getNumberEnv(
        'PASSING_SCORE_PERCENTAGE',
        DEFAULT_EXAM_CONFIG.passingScorePercentage,
        0,
        100
      ),
      leaderboardSize: getIntEnv('LEADERBOARD_SIZE', DEFAULT_EXAM_CONFIG.leaderboardSize, 1),
      grading: {
        caseSensitive: getBoolEnv('GRADING_CASE_SENSITIVE', DEFAULT_EXAM_CONFIG.grading.caseSensitive),
        trimWhitespace: getBoolEnv('GRADING_TRIM_WHITESPACE', DEFAULT_EXAM_CONFIG.grading.trimWhitespace),
      },
    },
  };
}
