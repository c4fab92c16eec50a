/**
 * HTTP Routes for Exams.
 *
 * - GET  /api/qualification         - Generate a qualification exam (login required)
 * - POST /api/qualification/submit  - Submit a qualification exam (login required)
 * - GET  /api/quiz/generate         - Generate a practice quiz (public)
 * - POST /api/quiz/submit           - Submit a practice quiz (login required)
 * - GET  /api/quiz/leaderboard      - Top practice scores (public)
 *
 * All endpoints return JSON with snake_case fields. Failures return
 * `{ error, code }` where `error` is the user-facing message.
 */

import type { IncomingHttpHeaders } from 'http';
import { z } from 'zod';
import type { Config } from './config.js';
import { AuthenticationError, ValidationError, isExamError } from './errors.js';
import type { ExamService, GeneratedExam } from './exam-service.js';
import { extractTokenFromHeader, verifyAuthToken, type AuthClaims } from './jwt.js';
import { ConsoleLogger } from './logger.js';

const logger = new ConsoleLogger('ExamRoutes');

// =============================================================================
// Types
// =============================================================================

/** The parts of an IncomingMessage the routes read */
export interface RouteRequest extends AsyncIterable<unknown> {
  url?: string;
  method?: string;
  headers: IncomingHttpHeaders;
}

/** The parts of a ServerResponse the routes write */
export interface RouteResponse {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(body?: string): unknown;
}

export interface ExamRouteContext {
  service: ExamService;
  config: Pick<Config, 'jwtSecret'>;
  /** Milliseconds since epoch; used for login token expiry */
  clock?: () => number;
}

const MAX_BODY_BYTES = 64 * 1024;

const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Authorization',
};

const submitBodySchema = z.object({
  exam_token: z.string().min(1, 'exam_token is required'),
  answers: z.record(z.union([z.string(), z.array(z.string())])),
});

// =============================================================================
// Response Helpers
// =============================================================================

/**
 * Send a JSON response.
 */
function sendJson(res: RouteResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, {
    'Content-Type': 'application/json',
    ...CORS_HEADERS,
  });
  res.end(JSON.stringify(body));
}

/**
 * Send a CORS preflight response.
 */
function sendCorsPreflight(res: RouteResponse): void {
  res.writeHead(204, {
    ...CORS_HEADERS,
    'Access-Control-Max-Age': '86400',
  });
  res.end();
}

function toChunk(chunk: unknown): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf-8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new ValidationError('Unsupported request body');
}

/**
 * Read and parse a JSON request body.
 *
 * @throws ValidationError if the body is empty, too large or not JSON
 */
async function parseJsonBody(req: RouteRequest): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const raw of req) {
    const chunk = toChunk(raw);
    size += chunk.length;
    if (size > MAX_BODY_BYTES) {
      throw new ValidationError(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    }
    chunks.push(chunk);
  }

  const body = Buffer.concat(chunks).toString('utf-8');
  if (!body) {
    throw new ValidationError('Invalid JSON body');
  }

  try {
    return JSON.parse(body);
  } catch {
    throw new ValidationError('Invalid JSON body');
  }
}

function serializeExam(exam: GeneratedExam): Record<string, unknown> {
  return {
    questions: exam.questions,
    exam_token: exam.examToken,
    expires_in: exam.expiresIn,
  };
}

// =============================================================================
// Authentication
// =============================================================================

function authenticate(req: RouteRequest, context: ExamRouteContext): AuthClaims | null {
  const header = req.headers.authorization;
  const token = extractTokenFromHeader(typeof header === 'string' ? header : null);
  if (!token) {
    return null;
  }
  return verifyAuthToken(token, context.config, context.clock?.());
}

function requireAuth(req: RouteRequest, context: ExamRouteContext): AuthClaims {
  const claims = authenticate(req, context);
  if (!claims) {
    throw new AuthenticationError('Missing or invalid login token');
  }
  return claims;
}

async function readSubmission(req: RouteRequest): Promise<{ examToken: string; answers: Record<string, string | string[]> }> {
  const parsed = submitBodySchema.safeParse(await parseJsonBody(req));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue.message, issue.path.join('.') || undefined);
  }
  return { examToken: parsed.data.exam_token, answers: parsed.data.answers };
}

// =============================================================================
// Route Handlers
// =============================================================================

/**
 * GET /api/qualification
 */
async function handleGenerateQualification(
  req: RouteRequest,
  res: RouteResponse,
  context: ExamRouteContext
): Promise<void> {
  const claims = requireAuth(req, context);
  const exam = await context.service.generate('qualification', claims.sub);
  sendJson(res, 200, serializeExam(exam));
}

/**
 * POST /api/qualification/submit
 */
async function handleSubmitQualification(
  req: RouteRequest,
  res: RouteResponse,
  context: ExamRouteContext
): Promise<void> {
  const claims = requireAuth(req, context);
  const submission = await readSubmission(req);
  const outcome = await context.service.submitQualification(claims.sub, submission);

  sendJson(res, 200, {
    score: outcome.score,
    correct_count: outcome.correctCount,
    total_questions: outcome.totalQuestions,
    passed: outcome.passed,
    message: outcome.message,
  });
}

/**
 * GET /api/quiz/generate
 *
 * Public. A logged-in caller gets a session bound to their account.
 */
async function handleGeneratePractice(
  req: RouteRequest,
  res: RouteResponse,
  context: ExamRouteContext
): Promise<void> {
  const claims = authenticate(req, context);
  const exam = await context.service.generate('practice', claims?.sub ?? null);
  sendJson(res, 200, serializeExam(exam));
}

/**
 * POST /api/quiz/submit
 */
async function handleSubmitPractice(
  req: RouteRequest,
  res: RouteResponse,
  context: ExamRouteContext
): Promise<void> {
  const claims = requireAuth(req, context);
  const submission = await readSubmission(req);
  const outcome = await context.service.submitPractice(claims.sub, submission);

  sendJson(res, 200, {
    score: outcome.score,
    correct_count: outcome.correctCount,
    total_questions: outcome.totalQuestions,
    message: outcome.message,
  });
}

/**
 * GET /api/quiz/leaderboard
 */
async function handleLeaderboard(
  _req: RouteRequest,
  res: RouteResponse,
  context: ExamRouteContext
): Promise<void> {
  const entries = await context.service.leaderboard();
  sendJson(
    res,
    200,
    entries.map(entry => ({
      username: entry.username,
      score: entry.score,
      created_at: entry.createdAt.toISOString(),
    }))
  );
}

type RouteHandler = (req: RouteRequest, res: RouteResponse, context: ExamRouteContext) => Promise<void>;

const ROUTES: Record<string, { method: 'GET' | 'POST'; handler: RouteHandler }> = {
  '/api/qualification': { method: 'GET', handler: handleGenerateQualification },
  '/api/qualification/submit': { method: 'POST', handler: handleSubmitQualification },
  '/api/quiz/generate': { method: 'GET', handler: handleGeneratePractice },
  '/api/quiz/submit': { method: 'POST', handler: handleSubmitPractice },
  '/api/quiz/leaderboard': { method: 'GET', handler: handleLeaderboard },
};

// =============================================================================
// Main Router
// =============================================================================

/**
 * Handle exam-related HTTP requests.
 *
 * @returns true if request was handled, false if not an exam route
 */
export async function handleExamRequest(
  req: RouteRequest,
  res: RouteResponse,
  context: ExamRouteContext
): Promise<boolean> {
  const url = req.url ?? '';
  const method = req.method?.toUpperCase();

  // Only handle /api/qualification* and /api/quiz* routes
  if (!url.startsWith('/api/qualification') && !url.startsWith('/api/quiz')) {
    return false;
  }

  if (method === 'OPTIONS') {
    sendCorsPreflight(res);
    return true;
  }

  const path = url.split('?')[0];
  const route = Object.hasOwn(ROUTES, path) ? ROUTES[path] : undefined;

  if (!route) {
    sendJson(res, 404, { error: 'Exam endpoint not found' });
    return true;
  }

  if (method !== route.method) {
    sendJson(res, 405, { error: 'Method not allowed' });
    return true;
  }

  try {
    await route.handler(req, res, context);
  } catch (err) {
    if (isExamError(err)) {
      if (err.statusCode >= 500) {
        logger.error(`${method} ${path} failed`, err.message);
      }
      sendJson(res, err.statusCode, { error: err.getUserMessage(), code: err.code });
    } else {
      logger.error('Error handling request', err);
      sendJson(res, 500, { error: 'Internal server error' });
    }
  }
  return true;
}
