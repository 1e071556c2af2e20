import { pool } from './pool.js';
import type { User } from '../../domain/auth/user.js';

interface UserRow {
  id: number;
  email: string;
  password_hash: string;
  created_at: Date;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class UserRepo {
  async findByEmail(email: string): Promise<User | null> {
    const result = await pool.query<UserRow>(
      'SELECT id, email, password_hash, created_at FROM users WHERE email = $1',
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async create(email: string, passwordHash: string): Promise<User> {
    const result = await pool.query<UserRow>(
      `INSERT INTO users (email, password_hash)
       VALUES ($1, $2)
       RETURNING id, email, password_hash, created_at`,
      [email, passwordHash]
    );

    return toUser(result.rows[0]);
  }
}
