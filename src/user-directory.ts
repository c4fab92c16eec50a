/**
 * User Directory - the exam engine's view of the platform's user accounts.
 *
 * The engine does not own users. It only needs to flag a user as verified
 * after a passing qualification exam and to show usernames on the leaderboard.
 */

import { z } from 'zod';
import type { Queryable } from './db.js';

export interface UserDirectory {
  /** Mark a user verified. Idempotent. */
  markVerified(subjectId: string): Promise<void>;
  /** Resolve usernames; unknown ids are absent from the result */
  resolveUsernames(subjectIds: readonly string[]): Promise<Map<string, string>>;
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

interface DirectoryUser {
  username: string;
  verified: boolean;
}

export class InMemoryUserDirectory implements UserDirectory {
  private readonly users = new Map<string, DirectoryUser>();

  addUser(subjectId: string, username: string, verified: boolean = false): void {
    this.users.set(subjectId, { username, verified });
  }

  isVerified(subjectId: string): boolean {
    return this.users.get(subjectId)?.verified ?? false;
  }

  async markVerified(subjectId: string): Promise<void> {
    const user = this.users.get(subjectId);
    if (user) {
      user.verified = true;
    }
  }

  async resolveUsernames(subjectIds: readonly string[]): Promise<Map<string, string>> {
    const names = new Map<string, string>();
    for (const id of subjectIds) {
      const user = this.users.get(id);
      if (user) {
        names.set(id, user.username);
      }
    }
    return names;
  }
}

// =============================================================================
// PostgreSQL Implementation
// =============================================================================

const userRowSchema = z.object({
  id: z.coerce.string(),
  username: z.string(),
});

export class PostgresUserDirectory implements UserDirectory {
  constructor(private readonly db: Queryable) {}

  async markVerified(subjectId: string): Promise<void> {
    await this.db.query('UPDATE users SET is_verified = TRUE WHERE id = $1', [subjectId]);
  }

  async resolveUsernames(subjectIds: readonly string[]): Promise<Map<string, string>> {
    const names = new Map<string, string>();
    if (subjectIds.length === 0) {
      return names;
    }

    const result = await this.db.query(
      'SELECT id, username FROM users WHERE id = ANY($1::bigint[])',
      [Array.from(new Set(subjectIds))]
    );

    for (const raw of result.rows) {
      const row = userRowSchema.parse(raw);
      names.set(row.id, row.username);
    }
    return names;
  }
}
