import type { Challenge, NewChallenge } from '@phonekey/domain';
import { randomUUID } from 'node:crypto';
import type { Database } from './db.js';

export type IncrementOutcome =
  | { status: 'INCREMENTED'; challenge: Challenge }
  | { status: 'REJECTED'; challenge: Challenge | null };

/**
 * Every mutation is one conditional write, so concurrent handlers for the same
 * phone number never need an outside lock.
 */
export interface ChallengeStore {
  /** Inserts a challenge and supersedes every earlier one for the phone. */
  create(input: NewChallenge, now: Date): Promise<Challenge>;
  /** The newest unsuperseded challenge, in whatever state it is in. */
  findLatest(phoneE164: string): Promise<Challenge | null>;
  /** Adds one attempt unless the challenge is no longer pending. */
  incrementAttempts(id: string, now: Date): Promise<IncrementOutcome>;
  /** Flips `verified` once; only the first caller gets `true`. */
  markVerified(id: string, now: Date): Promise<boolean>;
  setDeliveryReference(id: string, deliveryReference: string, now: Date): Promise<void>;
}

interface ChallengeRow {
  id: string;
  phone_e164: string;
  secret_digest: string;
  attempts_used: number;
  max_attempts: number;
  expires_at: Date;
  verified: boolean;
  verified_at: Date | null;
  superseded_at: Date | null;
  delivery_reference: string | null;
  created_at: Date;
  updated_at: Date;
}

function toChallenge(row: ChallengeRow): Challenge {
  return {
    id: row.id,
    phoneE164: row.phone_e164,
    secretDigest: row.secret_digest,
    attemptsUsed: row.attempts_used,
    maxAttempts: row.max_attempts,
    expiresAt: row.expires_at,
    verified: row.verified,
    verifiedAt: row.verified_at,
    supersededAt: row.superseded_at,
    deliveryReference: row.delivery_reference,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export class PgChallengeStore implements ChallengeStore {
  constructor(private readonly db: Database) {}

  async create(input: NewChallenge, now: Date): Promise<Challenge> {
    return this.db.transaction(async (tx) => {
      // Serializes issuers for one phone so exactly one row stays current.
      await tx.query('SELECT pg_advisory_xact_lock(hashtext($1))', [input.phoneE164]);
      await tx.query(
        `UPDATE otp_challenges
         SET superseded_at = $2, updated_at = $2
         WHERE phone_e164 = $1 AND superseded_at IS NULL`,
        [input.phoneE164, now]
      );
      const rows = await tx.query<ChallengeRow>(
        `INSERT INTO otp_challenges (
           id, phone_e164, secret_digest, attempts_used, max_attempts, expires_at, created_at, updated_at
         ) VALUES ($1, $2, $3, 0, $4, $5, $6, $6)
         RETURNING *`,
        [randomUUID(), input.phoneE164, input.secretDigest, input.maxAttempts, input.expiresAt, now]
      );
      if (!rows[0]) {
        throw new Error('challenge_insert_returned_nothing');
      }
      return toChallenge(rows[0]);
    });
  }

  async findLatest(phoneE164: string): Promise<Challenge | null> {
    const rows = await this.db.query<ChallengeRow>(
      `SELECT * FROM otp_challenges
       WHERE phone_e164 = $1 AND superseded_at IS NULL
       ORDER BY created_at DESC
       LIMIT 1`,
      [phoneE164]
    );
    return rows[0] ? toChallenge(rows[0]) : null;
  }

  async incrementAttempts(id: string, now: Date): Promise<IncrementOutcome> {
    const rows = await this.db.query<ChallengeRow>(
      `UPDATE otp_challenges
       SET attempts_used = attempts_used + 1, updated_at = $2
       WHERE id = $1
         AND verified = false
         AND superseded_at IS NULL
         AND expires_at > $2
         AND attempts_used < max_attempts
       RETURNING *`,
      [id, now]
    );
    if (rows[0]) {
      return { status: 'INCREMENTED', challenge: toChallenge(rows[0]) };
    }

    const current = await this.db.query<ChallengeRow>('SELECT * FROM otp_challenges WHERE id = $1', [id]);
    return { status: 'REJECTED', challenge: current[0] ? toChallenge(current[0]) : null };
  }

  async markVerified(id: string, now: Date): Promise<boolean> {
    const rows = await this.db.query<{ id: string }>(
      `UPDATE otp_challenges
       SET verified = true, verified_at = $2, updated_at = $2
       WHERE id = $1
         AND verified = false
         AND superseded_at IS NULL
         AND expires_at > $2
       RETURNING id`,
      [id, now]
    );
    return rows.length === 1;
  }

  async setDeliveryReference(id: string, deliveryReference: string, now: Date): Promise<void> {
    await this.db.query(
      'UPDATE otp_challenges SET delivery_reference = $2, updated_at = $3 WHERE id = $1',
      [id, deliveryReference, now]
    );
  }
}
