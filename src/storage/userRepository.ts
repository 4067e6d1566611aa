import type { UserRecord } from './userTypes';

// Abstracts user persistence behind a minimal lookup/insert interface.
export interface UserRepository {
  // Returns a user by id or undefined if missing.
  get(id: string): UserRecord | undefined;
  // Returns the user holding a username, if any.
  findByUsername(username: string): UserRecord | undefined;
  // Persists a new user record.
  insert(record: UserRecord): void;
}

// In-memory repository; state lives as long as the app instance.
export class InMemoryUserRepository implements UserRepository {
  private users = new Map<string, UserRecord>();

  get(id: string): UserRecord | undefined {
    return this.users.get(id);
  }

  findByUsername(username: string): UserRecord | undefined {
    const wanted = username.toLowerCase();
    for (const user of this.users.values()) {
      if (user.username.toLowerCase() === wanted) return user;
    }
    return undefined;
  }

  insert(record: UserRecord): void {
    this.users.set(record.id, record);
  }
}
