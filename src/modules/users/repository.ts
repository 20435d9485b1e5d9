import type { Knex } from 'knex';
import type { UserRow } from '../../types/index.js';

export interface NewUser {
  username: string;
  /** Already hashed by the caller; this store never sees plaintext. */
  password_hash: string;
  role: string;
  email: string;
  is_active?: boolean;
}

export type PublicUser = Omit<UserRow, 'password_hash'>;

/** Fields safe to hand out (never expose password_hash). */
export function sanitizeUser(u: UserRow): PublicUser {
  return {
    user_id: u.user_id,
    username: u.username,
    role: u.role,
    email: u.email,
    is_active: u.is_active,
    created_at: u.created_at,
    last_login: u.last_login,
  };
}

/** Insert a user. Duplicate username or email fails on the unique constraints. */
export async function createUser(db: Knex, input: NewUser): Promise<UserRow> {
  const [row]: UserRow[] = await db('users')
    .insert({
      username: input.username.trim(),
      password_hash: input.password_hash,
      role: input.role,
      email: input.email.trim().toLowerCase(),
      is_active: input.is_active ?? true,
    })
    .returning('*');
  return row;
}

export async function findUserById(db: Knex, userId: number): Promise<UserRow | undefined> {
  const row: UserRow | undefined = await db('users').where({ user_id: userId }).first();
  return row;
}

export async function findUserByUsername(db: Knex, username: string): Promise<UserRow | undefined> {
  const row: UserRow | undefined = await db('users').where({ username: username.trim() }).first();
  return row;
}

export async function listUsers(db: Knex): Promise<PublicUser[]> {
  const rows: UserRow[] = await db('users').orderBy('username').select('*');
  return rows.map(sanitizeUser);
}

/** Stamp last_login. Returns false if the user does not exist. */
export async function recordLogin(db: Knex, userId: number, at: Date = new Date()): Promise<boolean> {
  const updated = await db('users').where({ user_id: userId }).update({ last_login: at });
  return updated > 0;
}
