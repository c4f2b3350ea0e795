import { eq, and, gt } from 'drizzle-orm';
import { getDb } from '../index';
import { users, sessions, type User } from '../schema';
import type { SessionStore, UserStore } from '../store';

export type { User };

export const userModel: UserStore = {
  /**
   * Find a user by ID
   */
  async findById(id: string): Promise<User | undefined> {
    const db = getDb();
    const [found] = await db.select().from(users).where(eq(users.id, id));
    return found;
  },

  /**
   * Find a user by username
   */
  async findByUsername(username: string): Promise<User | undefined> {
    const db = getDb();
    const [found] = await db.select().from(users).where(eq(users.username, username));
    return found;
  },
};

export const sessionModel: SessionStore = {
  /**
   * Find the user of an unexpired session
   */
  async findUserByToken(token: string): Promise<User | undefined> {
    const db = getDb();
    const result = await db
      .select()
      .from(sessions)
      .innerJoin(users, eq(sessions.userId, users.id))
      .where(and(eq(sessions.token, token), gt(sessions.expiresAt, new Date())))
      .limit(1);

    return result[0]?.users;
  },
};
