import type { Pool } from 'pg';
import { ConflictError } from '../errors.js';
import {
  isWorkItemPriority,
  isWorkItemStatus,
  type User,
  type WorkItem,
} from '../../types/index.js';
import type {
  DataContext,
  UserWhereUnique,
  WorkItemOrderBy,
  WorkItemUpdateData,
  WorkItemWhere,
} from './types.js';

interface WorkItemRow {
  id: string;
  title: string;
  description: string | null;
  status: string;
  priority: string;
  created_at: Date;
  updated_at: Date;
}

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: Date;
}

const WORK_ITEM_COLUMNS = 'id, title, description, status, priority, created_at, updated_at';
const USER_COLUMNS = 'id, username, email, password_hash, created_at';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const UNIQUE_VIOLATION = '23505';

/**
 * Maps database row to WorkItem
 */
function mapRowToWorkItem(row: WorkItemRow): WorkItem {
  if (!isWorkItemStatus(row.status)) {
    throw new Error(`Unexpected work item status '${row.status}' for ${row.id}`);
  }
  if (!isWorkItemPriority(row.priority)) {
    throw new Error(`Unexpected work item priority '${row.priority}' for ${row.id}`);
  }
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    status: row.status,
    priority: row.priority,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: new Date(row.created_at),
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === UNIQUE_VIOLATION;
}

/**
 * Builds a WHERE clause from equality predicates.
 * Placeholders are numbered from 1; `values` receives the parameters in order.
 */
export function buildWorkItemWhere(where: WorkItemWhere | undefined, values: unknown[]): string {
  const conditions: string[] = [];

  if (where?.status !== undefined) {
    values.push(where.status);
    conditions.push(`status = $${values.length}`);
  }

  if (where?.priority !== undefined) {
    values.push(where.priority);
    conditions.push(`priority = $${values.length}`);
  }

  return conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
}

/**
 * ORDER BY with id as a tiebreaker in the same direction, so page boundaries are stable.
 */
export function buildWorkItemOrderBy(orderBy: WorkItemOrderBy): string {
  const direction = orderBy.direction === 'asc' ? 'ASC' : 'DESC';
  const column = orderBy.field === 'title' ? 'title COLLATE "C"' : 'created_at';
  return `ORDER BY ${column} ${direction}, id ${direction}`;
}

const UPDATE_COLUMNS: ReadonlyArray<readonly [keyof WorkItemUpdateData, string]> = [
  ['title', 'title'],
  ['description', 'description'],
  ['status', 'status'],
  ['priority', 'priority'],
  ['updatedAt', 'updated_at'],
];

function userColumn(where: UserWhereUnique): { column: string; value: string } {
  if ('id' in where) return { column: 'id', value: where.id };
  if ('username' in where) return { column: 'username', value: where.username };
  return { column: 'email', value: where.email };
}

async function findWorkItemById(pool: Pool, id: string): Promise<WorkItem | null> {
  if (!UUID_PATTERN.test(id)) return null;

  const result = await pool.query<WorkItemRow>(
    `SELECT ${WORK_ITEM_COLUMNS} FROM work_items WHERE id = $1`,
    [id]
  );
  const row = result.rows[0];
  return row ? mapRowToWorkItem(row) : null;
}

/**
 * DataContext backed by PostgreSQL. Tables are created by db/schema.sql.
 */
export function createPgContext(pool: Pool): DataContext {
  return {
    kind: 'postgres',

    workItem: {
      async findMany({ where, orderBy, skip, take }) {
        const values: unknown[] = [];
        const whereClause = buildWorkItemWhere(where, values);
        values.push(take, skip);
        const sql = [
          `SELECT ${WORK_ITEM_COLUMNS} FROM work_items`,
          whereClause,
          buildWorkItemOrderBy(orderBy),
          `LIMIT $${values.length - 1} OFFSET $${values.length}`,
        ]
          .filter(Boolean)
          .join(' ');

        const result = await pool.query<WorkItemRow>(sql, values);
        return result.rows.map(mapRowToWorkItem);
      },

      async count(args) {
        const values: unknown[] = [];
        const whereClause = buildWorkItemWhere(args?.where, values);
        const sql = ['SELECT COUNT(*)::int AS total FROM work_items', whereClause]
          .filter(Boolean)
          .join(' ');

        const result = await pool.query<{ total: number }>(sql, values);
        return result.rows[0]?.total ?? 0;
      },

      async findUnique({ where }) {
        return findWorkItemById(pool, where.id);
      },

      async create({ data }) {
        try {
          const result = await pool.query<WorkItemRow>(
            `INSERT INTO work_items (${WORK_ITEM_COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7)
             RETURNING ${WORK_ITEM_COLUMNS}`,
            [
              data.id,
              data.title,
              data.description,
              data.status,
              data.priority,
              data.createdAt,
              data.updatedAt,
            ]
          );
          return mapRowToWorkItem(result.rows[0]);
        } catch (err) {
          if (isUniqueViolation(err)) {
            throw new ConflictError(`WorkItem with id '${data.id}' already exists`);
          }
          throw err;
        }
      },

      async update({ where, data }) {
        if (!UUID_PATTERN.test(where.id)) return null;

        const values: unknown[] = [];
        const assignments: string[] = [];
        for (const [key, column] of UPDATE_COLUMNS) {
          const value = data[key];
          if (value === undefined) continue;
          values.push(value);
          assignments.push(`${column} = $${values.length}`);
        }

        if (assignments.length === 0) {
          return findWorkItemById(pool, where.id);
        }

        values.push(where.id);
        const result = await pool.query<WorkItemRow>(
          `UPDATE work_items SET ${assignments.join(', ')}
           WHERE id = $${values.length}
           RETURNING ${WORK_ITEM_COLUMNS}`,
          values
        );
        const row = result.rows[0];
        return row ? mapRowToWorkItem(row) : null;
      },

      async delete({ where }) {
        if (!UUID_PATTERN.test(where.id)) return false;

        const result = await pool.query('DELETE FROM work_items WHERE id = $1', [where.id]);
        return (result.rowCount ?? 0) > 0;
      },
    },

    user: {
      async findUnique({ where }) {
        const { column, value } = userColumn(where);
        if (column === 'id' && !UUID_PATTERN.test(value)) return null;

        const result = await pool.query<UserRow>(
          `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = $1`,
          [value]
        );
        const row = result.rows[0];
        return row ? mapRowToUser(row) : null;
      },

      async create({ data }) {
        try {
          const result = await pool.query<UserRow>(
            `INSERT INTO users (${USER_COLUMNS})
             VALUES ($1, $2, $3, $4, $5)
             RETURNING ${USER_COLUMNS}`,
            [data.id, data.username, data.email, data.passwordHash, data.createdAt]
          );
          return mapRowToUser(result.rows[0]);
        } catch (err) {
          if (isUniqueViolation(err)) {
            throw new ConflictError('Username or email is already registered');
          }
          throw err;
        }
      },
    },

    async ping() {
      await pool.query('SELECT 1');
    },

    async close() {
      await pool.end();
    },
  };
}
