import { eq } from "drizzle-orm";
import { users, type Database, type User } from "../db";
import { ConflictError } from "../lib/errors";

export interface UserRepository {
  createUser(username: string): Promise<User>;
  getUserById(id: string): Promise<User | null>;
}

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ("code" in error && error.code === UNIQUE_VIOLATION) return true;
  // drizzle wraps driver errors and keeps the original as `cause`
  return error.cause !== undefined && isUniqueViolation(error.cause);
}

export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: Database) {}

  async createUser(username: string): Promise<User> {
    try {
      const [user] = await this.db
        .insert(users)
        .values({ username })
        .returning();
      return user;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Username already exists: ${username}`, { username });
      }
      throw error;
    }
  }

  async getUserById(id: string): Promise<User | null> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(eq(users.id, id))
      .limit(1);
    return user ?? null;
  }
}
