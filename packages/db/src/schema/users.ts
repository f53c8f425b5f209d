import {
  uuid,
  varchar,
  timestamp,
  boolean,
  index,
  uniqueIndex,
  pgEnum,
} from 'drizzle-orm/pg-core';
import { USER_ROLES } from '@metrica/shared-types';
import { authSchema, organizations } from './organizations.js';

// ─── Enums ────────────────────────────────────────────────────────────
export const userRoleEnum = pgEnum('user_role', USER_ROLES);

// ─── Users ────────────────────────────────────────────────────────────
// Read-only from the KPI service: role lookups and responsible-user resolution.
export const users = authSchema.table(
  'users',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    organizationId: uuid('organization_id')
      .notNull()
      .references(() => organizations.id, { onDelete: 'cascade' }),
    email: varchar('email', { length: 255 }).notNull(),
    firstName: varchar('first_name', { length: 100 }).notNull(),
    lastName: varchar('last_name', { length: 100 }).notNull(),
    role: userRoleEnum('role').notNull().default('agent'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('users_org_email_idx').on(table.organizationId, table.email),
    index('users_org_idx').on(table.organizationId),
    index('users_org_role_idx').on(table.organizationId, table.role),
  ]
);
