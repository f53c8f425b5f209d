import { and, eq, inArray } from 'drizzle-orm';
import { db as defaultDb, schema, type Database } from '@metrica/db';
import type { UserRole } from '@metrica/shared-types';
import type { DirectoryUser } from '../types.js';

/** Read-only view of the organization's users and their current roles. */
export interface UserDirectory {
  getUser(userId: string): Promise<DirectoryUser | null>;
  listActiveUsersByIds(organizationId: string, userIds: string[]): Promise<DirectoryUser[]>;
  listActiveUsersByRole(organizationId: string, role: UserRole): Promise<DirectoryUser[]>;
  listActiveUsersByRoles(organizationId: string, roles: UserRole[]): Promise<DirectoryUser[]>;
}

const { users } = schema;

const directoryColumns = {
  id: users.id,
  organizationId: users.organizationId,
  email: users.email,
  firstName: users.firstName,
  lastName: users.lastName,
  role: users.role,
  isActive: users.isActive,
};

export class DrizzleUserDirectory implements UserDirectory {
  constructor(private readonly db: Database = defaultDb) {}

  async getUser(userId: string): Promise<DirectoryUser | null> {
    const [row] = await this.db.select(directoryColumns).from(users).where(eq(users.id, userId)).limit(1);
    return row ?? null;
  }

  async listActiveUsersByIds(organizationId: string, userIds: string[]): Promise<DirectoryUser[]> {
    if (userIds.length === 0) return [];
    return this.db
      .select(directoryColumns)
      .from(users)
      .where(
        and(
          eq(users.organizationId, organizationId),
          eq(users.isActive, true),
          inArray(users.id, userIds)
        )
      );
  }

  async listActiveUsersByRole(organizationId: string, role: UserRole): Promise<DirectoryUser[]> {
    return this.listActiveUsersByRoles(organizationId, [role]);
  }

  async listActiveUsersByRoles(organizationId: string, roles: UserRole[]): Promise<DirectoryUser[]> {
    if (roles.length === 0) return [];
    return this.db
      .select(directoryColumns)
      .from(users)
      .where(
        and(
          eq(users.organizationId, organizationId),
          eq(users.isActive, true),
          inArray(users.role, roles)
        )
      );
  }
}
