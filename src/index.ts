/**
 * Heritage Exam Engine
 *
 * Stateless qualification and practice exams for the architecture platform.
 *
 * Routes:
 *   /api/qualification*  → Qualification exam (generate, submit)
 *   /api/quiz/*          → Practice quiz (generate, submit, leaderboard)
 *   /health              → Health check endpoint
 *
 * Modes:
 *   DEV_MODE=true  → In-memory stores seeded from QUESTION_FILE
 *   DEV_MODE=false → PostgreSQL (DATABASE_URL)
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { loadConfig, type Config } from './config.js';
import { createPool } from './db.js';
import { handleExamRequest } from './exam-routes.js';
import { ExamService } from './exam-service.js';
import { setLogLevel } from './logger.js';
import { loadQuestionFile, PostgresQuestionBank, type QuestionBank } from './question-bank.js';
import { QuestionSelector } from './question-selector.js';
import {
  InMemoryResultRepository,
  PostgresResultRepository,
  ResultStore,
  type ResultRepository,
} from './result-store.js';
import { SessionCodec } from './session-codec.js';
import { InMemoryUserDirectory, PostgresUserDirectory, type UserDirectory } from './user-directory.js';

interface Backends {
  bank: QuestionBank;
  repository: ResultRepository;
  directory: UserDirectory;
  close: () => Promise<void>;
}

async function createBackends(config: Config): Promise<Backends> {
  if (config.devMode || !config.databaseUrl) {
    return {
      bank: await loadQuestionFile(config.questionFile),
      repository: new InMemoryResultRepository(),
      directory: new InMemoryUserDirectory(),
      close: async () => {},
    };
  }

  const pool = createPool(config.databaseUrl);
  return {
    bank: new PostgresQuestionBank(pool),
    repository: new PostgresResultRepository(pool),
    directory: new PostgresUserDirectory(pool),
    close: () => pool.end(),
  };
}

/**
 * Health check handler for Kubernetes liveness and readiness checks
 */
function handleHealthCheck(res: ServerResponse, config: Config): void {
  res.writeHead(200, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({
    status: 'ok',
    timestamp: new Date().toISOString(),
    mode: config.devMode ? 'development' : 'production',
  }));
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  let config: Config;
  try {
    config = loadConfig();
  } catch (err) {
    console.error('Failed to load configuration:', err);
    process.exit(1);
  }
  setLogLevel(config.logLevel);

  const mode = config.devMode ? 'DEVELOPMENT' : 'PRODUCTION';
  console.log('Heritage Exam Engine starting...');
  console.log(`  Mode: ${mode}`);
  console.log(`  Port: ${config.port}`);
  console.log(`  Qualification: ${config.exam.qualificationQuestionCount} questions, pass at ${config.exam.passingScorePercentage}%`);
  console.log(`  Practice: ${config.exam.practiceSingleCount} single + ${config.exam.practiceMultipleCount} multiple`);
  console.log(`  Session TTL: ${config.exam.sessionTtlSeconds}s`);
  console.log(`  Log level: ${config.logLevel}`);

  if (config.devMode) {
    console.log('  ⚠️  Dev mode: in-memory results, development secrets');
  }

  const backends = await createBackends(config);
  const service = new ExamService({
    config: config.exam,
    selector: new QuestionSelector(backends.bank),
    codec: new SessionCodec({ signingKey: config.examSigningKey }),
    store: new ResultStore(backends.repository, backends.directory),
  });
  const routeContext = { service, config };

  const handleRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (req.url === '/health' || req.url === '/healthz') {
      handleHealthCheck(res, config);
      return;
    }

    const handled = await handleExamRequest(req, res, routeContext);
    if (!handled) {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not Found' }));
    }
  };

  const server = createServer((req, res) => {
    handleRequest(req, res).catch((err: unknown) => {
      console.error('❌ Unhandled request error:', err);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    });
  });

  // Handle server errors (e.g., port already in use)
  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`\n❌ Port ${config.port} is already in use.`);
      process.exit(1);
    }
    console.error('❌ Server error:', err.message);
    process.exit(1);
  });

  server.listen(config.port, () => {
    console.log(`\n✅ Heritage Exam Engine listening on port ${config.port}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    server.close(() => {
      backends
        .close()
        .then(() => {
          console.log('Server closed');
          process.exit(0);
        })
        .catch((err: unknown) => {
          console.error('Failed to close database pool:', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
