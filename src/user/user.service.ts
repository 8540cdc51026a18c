import { Injectable, NotFoundException } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';

export interface User {
  id: string;
  clerkId: string | null;
  displayName: string;
  createdAt: Date;
}

type UserRow = {
  id: string;
  clerk_id: string | null;
  display_name: string;
  created_at: Date;
};

const USER_COLUMNS = 'id, clerk_id, display_name, created_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    clerkId: row.clerk_id,
    displayName: row.display_name,
    createdAt: row.created_at,
  };
}

@Injectable()
export class UserService {
  constructor(private readonly db: DatabaseService) {}

  private async findOne(column: 'clerk_id' | 'display_name', value: string) {
    const rows = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = $1`,
      [value],
    );
    const row = rows[0];
    return row ? toUser(row) : null;
  }

  private async getAvailableDisplayName(
    baseDisplayName: string,
    excludeUserId?: string,
  ): Promise<string> {
    const base = baseDisplayName.trim().slice(0, 64) || 'User';
    let candidate = base;
    let suffix = 0;
    while (true) {
      const taken = await this.findOne('display_name', candidate);
      if (!taken || taken.id === excludeUserId) return candidate;
      candidate = `${base}_${++suffix}`;
    }
  }

  private async rename(user: User, displayName: string): Promise<User> {
    const candidate = await this.getAvailableDisplayName(displayName, user.id);
    if (candidate === user.displayName) return user;
    const rows = await this.db.query<UserRow>(
      `UPDATE users SET display_name = $2 WHERE id = $1 RETURNING ${USER_COLUMNS}`,
      [user.id, candidate],
    );
    const row = rows[0];
    if (!row) throw new NotFoundException('User not found');
    return toUser(row);
  }

  async updateDisplayNameFromClerk(clerkId: string, displayName: string) {
    const preferredDisplayName = displayName.trim();
    if (!preferredDisplayName) {
      return this.syncFromClerk(clerkId);
    }

    const existing = await this.findOne('clerk_id', clerkId);
    if (!existing) {
      return this.syncFromClerk(clerkId, preferredDisplayName);
    }
    return this.rename(existing, preferredDisplayName);
  }

  /** Sync or create user from Clerk. Returns app user. */
  async syncFromClerk(clerkId: string, displayName?: string): Promise<User> {
    const preferredDisplayName = displayName?.trim();
    const existing = await this.findOne('clerk_id', clerkId);
    if (existing) {
      if (!preferredDisplayName || preferredDisplayName === existing.displayName) {
        return existing;
      }
      return this.rename(existing, preferredDisplayName);
    }

    const candidate = await this.getAvailableDisplayName(
      preferredDisplayName || `User_${clerkId.slice(-8)}`,
    );
    const rows = await this.db.query<UserRow>(
      `INSERT INTO users (clerk_id, display_name) VALUES ($1, $2)
       ON CONFLICT (clerk_id) DO UPDATE SET clerk_id = EXCLUDED.clerk_id
       RETURNING ${USER_COLUMNS}`,
      [clerkId, candidate],
    );
    const row = rows[0];
    if (!row) throw new NotFoundException('User not found');
    return toUser(row);
  }

  /** Ledger account of a signed-in user: their app user id. */
  async accountFor(clerkId: string): Promise<string> {
    const user = await this.syncFromClerk(clerkId);
    return user.id;
  }
}
