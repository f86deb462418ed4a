import type { User } from '@phonekey/domain';
import { randomUUID } from 'node:crypto';
import type { Queryable } from './db.js';

export interface UserProvisioner {
  resolveOrCreateByPhone(phoneE164: string): Promise<User>;
  findById(userId: string): Promise<User | null>;
}

interface UserRow {
  id: string;
  phone_e164: string;
  last_login_at: Date | null;
  created_at: Date;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    phoneE164: row.phone_e164,
    lastLoginAt: row.last_login_at,
    createdAt: row.created_at
  };
}

export class UserService implements UserProvisioner {
  constructor(private readonly db: Queryable) {}

  async findById(userId: string): Promise<User | null> {
    const rows = await this.db.query<UserRow>('SELECT * FROM users WHERE id = $1', [userId]);
    return rows[0] ? toUser(rows[0]) : null;
  }

  async resolveOrCreateByPhone(phoneE164: string): Promise<User> {
    const rows = await this.db.query<UserRow>(
      `INSERT INTO users (id, phone_e164, last_login_at)
       VALUES ($1, $2, now())
       ON CONFLICT (phone_e164)
       DO UPDATE SET last_login_at = now(), updated_at = now()
       RETURNING *`,
      [randomUUID(), phoneE164]
    );
    if (!rows[0]) {
      throw new Error('failed_to_resolve_user');
    }
    return toUser(rows[0]);
  }
}
