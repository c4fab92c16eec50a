import { Readable } from 'stream';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { DEFAULT_EXAM_CONFIG } from './config.js';
import { handleExamRequest, type ExamRouteContext, type RouteResponse } from './exam-routes.js';
import { ExamService } from './exam-service.js';
import { generateAuthToken } from './jwt.js';
import { InMemoryQuestionBank } from './question-bank.js';
import { QuestionSelector } from './question-selector.js';
import { InMemoryResultRepository, ResultStore, type ResultRepository } from './result-store.js';
import { SessionCodec } from './session-codec.js';
import type { Question } from './types.js';
import { InMemoryUserDirectory } from './user-directory.js';

const NOW = Date.UTC(2025, 0, 1, 12, 0, 0);
const authConfig = { jwtSecret: 'test-secret' };

const generatedExamSchema = z.object({
  questions: z.array(
    z.object({
      id: z.number(),
      type: z.enum(['single', 'multiple']),
      content: z.string(),
      options: z.array(z.string()),
    })
  ),
  exam_token: z.string(),
  expires_in: z.number(),
});

class FakeResponse implements RouteResponse {
  statusCode = 0;
  headers: Record<string, string> = {};
  body = '';

  writeHead(statusCode: number, headers: Record<string, string>): this {
    this.statusCode = statusCode;
    this.headers = headers;
    return this;
  }

  end(body?: string): this {
    this.body = body ?? '';
    return this;
  }

  json(): unknown {
    return JSON.parse(this.body);
  }
}

interface FakeRequestInit {
  method: string;
  url: string;
  token?: string;
  authorization?: string;
  body?: string;
}

function request(init: FakeRequestInit) {
  const authorization = init.authorization ?? (init.token ? `Bearer ${init.token}` : undefined);
  return Object.assign(Readable.from(init.body === undefined ? [] : [Buffer.from(init.body)]), {
    url: init.url,
    method: init.method,
    headers: authorization ? { authorization } : {},
  });
}

function question(id: number): Question {
  return {
    id,
    kind: id > 100 ? 'multiple' : 'single',
    content: `Question ${id}`,
    options: ['A', 'B', 'C'],
    answer: id > 100 ? { kind: 'multiple', values: ['A', 'B'] } : { kind: 'single', value: 'A' },
    explanation: 'Because.',
  };
}

describe('exam-routes', () => {
  let now: number;
  let repository: ResultRepository;
  let directory: InMemoryUserDirectory;
  let service: ExamService;
  let context: ExamRouteContext;
  let aliceToken: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    now = NOW;
    repository = new InMemoryResultRepository();
    directory = new InMemoryUserDirectory();
    directory.addUser('42', 'alice');

    const bank = new InMemoryQuestionBank([
      ...Array.from({ length: 10 }, (_, i) => question(i + 1)),
      ...Array.from({ length: 5 }, (_, i) => question(101 + i)),
    ]);
    service = new ExamService({
      config: {
        ...DEFAULT_EXAM_CONFIG,
        qualificationQuestionCount: 5,
        practiceSingleCount: 3,
        practiceMultipleCount: 2,
      },
      selector: new QuestionSelector(bank),
      codec: new SessionCodec({ signingKey: 'test-exam-secret' }),
      store: new ResultStore(repository, directory, () => new Date(now)),
      clock: () => now,
    });
    context = { service, config: authConfig, clock: () => now };
    aliceToken = generateAuthToken({ sub: '42', role: 'user' }, authConfig, 3600, NOW);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function send(init: FakeRequestInit): Promise<FakeResponse> {
    const res = new FakeResponse();
    const handled = await handleExamRequest(request(init), res, context);
    expect(handled).toBe(true);
    return res;
  }

  async function generateQualification(): Promise<z.infer<typeof generatedExamSchema>> {
    const res = await send({ method: 'GET', url: '/api/qualification', token: aliceToken });
    expect(res.statusCode).toBe(200);
    return generatedExamSchema.parse(res.json());
  }

  describe('routing', () => {
    it('ignores paths outside the exam API', async () => {
      const res = new FakeResponse();
      const handled = await handleExamRequest(request({ method: 'GET', url: '/api/users' }), res, context);

      expect(handled).toBe(false);
      expect(res.statusCode).toBe(0);
    });

    it('answers CORS preflight', async () => {
      const res = await send({ method: 'OPTIONS', url: '/api/quiz/submit' });

      expect(res.statusCode).toBe(204);
      expect(res.headers['Access-Control-Allow-Methods']).toBe('GET, POST, OPTIONS');
      expect(res.body).toBe('');
    });

    it('returns 404 for unknown exam paths', async () => {
      const res = await send({ method: 'GET', url: '/api/quiz/history' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Exam endpoint not found' });
    });

    it('returns 405 for the wrong method', async () => {
      const res = await send({ method: 'POST', url: '/api/quiz/generate' });

      expect(res.statusCode).toBe(405);
      expect(res.json()).toEqual({ error: 'Method not allowed' });
    });

    it('ignores the query string', async () => {
      const res = await send({ method: 'GET', url: '/api/quiz/leaderboard?page=1' });
      expect(res.statusCode).toBe(200);
    });
  });

  describe('GET /api/qualification', () => {
    it('requires a login token', async () => {
      const res = await send({ method: 'GET', url: '/api/qualification' });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({
        error: 'Authentication required. Please log in again.',
        code: 'AUTH_REQUIRED',
      });
    });

    it('rejects an expired login token', async () => {
      now = NOW + 3_601_000;
      const res = await send({ method: 'GET', url: '/api/qualification', token: aliceToken });
      expect(res.statusCode).toBe(401);
    });

    it('returns questions without answers and a session token', async () => {
      const res = await send({ method: 'GET', url: '/api/qualification', token: aliceToken });

      expect(res.statusCode).toBe(200);
      expect(res.headers['Content-Type']).toBe('application/json');
      expect(res.body).not.toContain('Because.');

      const exam = generatedExamSchema.parse(res.json());
      expect(exam.questions).toHaveLength(5);
      expect(exam.expires_in).toBe(900);
    });
  });

  describe('POST /api/qualification/submit', () => {
    it('grades and records the submission', async () => {
      const exam = await generateQualification();
      const answers = Object.fromEntries(
        exam.questions.map(q => [String(q.id), q.type === 'single' ? 'A' : ['B', 'A']])
      );

      const res = await send({
        method: 'POST',
        url: '/api/qualification/submit',
        token: aliceToken,
        body: JSON.stringify({ exam_token: exam.exam_token, answers }),
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        score: 100,
        correct_count: 5,
        total_questions: 5,
        passed: true,
        message: 'Verification successful!',
      });
      expect(directory.isVerified('42')).toBe(true);
    });

    it('reports an expired session', async () => {
      const exam = await generateQualification();
      now = NOW + 901_000;

      const res = await send({
        method: 'POST',
        url: '/api/qualification/submit',
        token: aliceToken,
        body: JSON.stringify({ exam_token: exam.exam_token, answers: {} }),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'Your time for this exam ran out. Please start a new exam.',
        code: 'TOKEN_EXPIRED',
      });
    });

    it('reports a malformed session token', async () => {
      const res = await send({
        method: 'POST',
        url: '/api/qualification/submit',
        token: aliceToken,
        body: JSON.stringify({ exam_token: 'not-a-token', answers: {} }),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'The exam token is not valid. Please restart the exam.',
        code: 'MALFORMED_TOKEN',
      });
    });

    it('does not accept a login token as a session token', async () => {
      const res = await send({
        method: 'POST',
        url: '/api/qualification/submit',
        token: aliceToken,
        body: JSON.stringify({ exam_token: aliceToken, answers: {} }),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ code: 'INVALID_SIGNATURE' });
    });

    it('rejects a body that is not JSON', async () => {
      const res = await send({
        method: 'POST',
        url: '/api/qualification/submit',
        token: aliceToken,
        body: '{answers',
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'Validation failed: Invalid JSON body',
        code: 'VALIDATION_ERROR',
      });
    });

    it('names a missing field', async () => {
      const res = await send({
        method: 'POST',
        url: '/api/qualification/submit',
        token: aliceToken,
        body: JSON.stringify({ answers: {} }),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'Invalid value for exam_token: Required',
        code: 'VALIDATION_ERROR',
      });
    });

    it('rejects an oversized body', async () => {
      const res = await send({
        method: 'POST',
        url: '/api/qualification/submit',
        token: aliceToken,
        body: 'x'.repeat(64 * 1024 + 1),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
    });

    it('reports a storage failure as retryable server error', async () => {
      const exam = await generateQualification();
      vi.spyOn(repository, 'upsertQualification').mockRejectedValue(new Error('connection reset'));

      const res = await send({
        method: 'POST',
        url: '/api/qualification/submit',
        token: aliceToken,
        body: JSON.stringify({ exam_token: exam.exam_token, answers: {} }),
      });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        error: 'Your answers were graded but could not be saved. Please try again later.',
        code: 'PERSISTENCE_FAILED',
      });
    });
  });

  describe('practice quiz', () => {
    it('generates a quiz without a login', async () => {
      const res = await send({ method: 'GET', url: '/api/quiz/generate' });

      expect(res.statusCode).toBe(200);
      const exam = generatedExamSchema.parse(res.json());
      expect(exam.questions.map(q => q.type)).toEqual(['single', 'single', 'single', 'multiple', 'multiple']);
    });

    it('treats an unusable login token as anonymous when generating', async () => {
      const res = await send({ method: 'GET', url: '/api/quiz/generate', authorization: 'Bearer nonsense' });
      expect(res.statusCode).toBe(200);
    });

    it('requires a login to submit', async () => {
      const res = await send({
        method: 'POST',
        url: '/api/quiz/submit',
        body: JSON.stringify({ exam_token: 'x.y.z', answers: {} }),
      });
      expect(res.statusCode).toBe(401);
    });

    it('submits and shows up on the leaderboard', async () => {
      const generated = await send({ method: 'GET', url: '/api/quiz/generate' });
      const exam = generatedExamSchema.parse(generated.json());
      const answers = Object.fromEntries(exam.questions.map(q => [String(q.id), q.type === 'single' ? 'A' : 'A,B']));

      const submitted = await send({
        method: 'POST',
        url: '/api/quiz/submit',
        token: aliceToken,
        body: JSON.stringify({ exam_token: exam.exam_token, answers }),
      });

      expect(submitted.statusCode).toBe(200);
      expect(submitted.json()).toEqual({
        score: 100,
        correct_count: 5,
        total_questions: 5,
        message: 'Exam submitted successfully',
      });

      const board = await send({ method: 'GET', url: '/api/quiz/leaderboard' });
      expect(board.json()).toEqual([
        { username: 'alice', score: 100, created_at: '2025-01-01T12:00:00.000Z' },
      ]);
    });

    it('hides unexpected failures behind a generic message', async () => {
      vi.spyOn(service, 'leaderboard').mockRejectedValue(new TypeError('boom'));

      const res = await send({ method: 'GET', url: '/api/quiz/leaderboard' });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'Internal server error' });
    });
  });
});
