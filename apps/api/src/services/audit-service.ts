import { randomUUID } from 'node:crypto';
import { maskPhone } from '../utils/phone.js';
import type { Queryable } from './db.js';

export type AuthAuditEvent =
  | 'AUTH_OTP_ISSUED'
  | 'AUTH_OTP_RESENT'
  | 'AUTH_OTP_RATE_LIMITED'
  | 'AUTH_OTP_VERIFY_REJECTED'
  | 'AUTH_PHONE_VERIFIED'
  | 'AUTH_SESSION_REFRESHED';

/**
 * One authentication event. `phoneE164` is masked before it is stored;
 * `challengeId` is null for events that never reached a challenge.
 */
export interface AuditEntry {
  eventType: AuthAuditEvent;
  phoneE164: string;
  userId: string | null;
  challengeId: string | null;
  metadata?: Record<string, unknown>;
}

export interface AuditLog {
  log(entry: AuditEntry): Promise<void>;
}

export class AuditService implements AuditLog {
  constructor(private readonly db: Queryable) {}

  async log(entry: AuditEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO audit_logs (id, event_type, phone_masked, user_id, challenge_id, metadata_json)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        randomUUID(),
        entry.eventType,
        maskPhone(entry.phoneE164),
        entry.userId,
        entry.challengeId,
        JSON.stringify(entry.metadata ?? {})
      ]
    );
  }
}
