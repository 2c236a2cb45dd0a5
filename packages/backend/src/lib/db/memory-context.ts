import { ConflictError } from '../errors.js';
import type { User, WorkItem } from '../../types/index.js';
import type {
  DataContext,
  UserWhereUnique,
  WorkItemOrderBy,
  WorkItemWhere,
} from './types.js';

function copyWorkItem(item: WorkItem): WorkItem {
  return {
    ...item,
    createdAt: new Date(item.createdAt.getTime()),
    updatedAt: new Date(item.updatedAt.getTime()),
  };
}

function copyUser(user: User): User {
  return { ...user, createdAt: new Date(user.createdAt.getTime()) };
}

function matches(item: WorkItem, where: WorkItemWhere | undefined): boolean {
  if (!where) return true;
  if (where.status !== undefined && item.status !== where.status) return false;
  if (where.priority !== undefined && item.priority !== where.priority) return false;
  return true;
}

// Ordinal comparison, same as ORDER BY ... COLLATE "C"
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function comparator(orderBy: WorkItemOrderBy): (a: WorkItem, b: WorkItem) => number {
  const sign = orderBy.direction === 'asc' ? 1 : -1;
  return (a, b) => {
    const primary =
      orderBy.field === 'title'
        ? compareStrings(a.title, b.title)
        : a.createdAt.getTime() - b.createdAt.getTime();
    return sign * (primary !== 0 ? primary : compareStrings(a.id, b.id));
  };
}

function findUser(users: Map<string, User>, where: UserWhereUnique): User | undefined {
  if ('id' in where) {
    return users.get(where.id);
  }
  for (const user of users.values()) {
    if ('username' in where && user.username === where.username) return user;
    if ('email' in where && user.email === where.email) return user;
  }
  return undefined;
}

/**
 * DataContext kept in process memory. Used when no DATABASE_URL is
 * configured and by the test suite.
 */
export function createMemoryContext(seed: { workItems?: WorkItem[]; users?: User[] } = {}): DataContext {
  const workItems = new Map<string, WorkItem>();
  const users = new Map<string, User>();

  for (const item of seed.workItems ?? []) {
    workItems.set(item.id, copyWorkItem(item));
  }
  for (const user of seed.users ?? []) {
    users.set(user.id, copyUser(user));
  }

  return {
    kind: 'memory',

    workItem: {
      async findMany({ where, orderBy, skip, take }) {
        return [...workItems.values()]
          .filter((item) => matches(item, where))
          .sort(comparator(orderBy))
          .slice(skip, skip + take)
          .map(copyWorkItem);
      },

      async count(args) {
        let total = 0;
        for (const item of workItems.values()) {
          if (matches(item, args?.where)) total++;
        }
        return total;
      },

      async findUnique({ where }) {
        const item = workItems.get(where.id);
        return item ? copyWorkItem(item) : null;
      },

      async create({ data }) {
        if (workItems.has(data.id)) {
          throw new ConflictError(`WorkItem with id '${data.id}' already exists`);
        }
        workItems.set(data.id, copyWorkItem(data));
        return copyWorkItem(data);
      },

      async update({ where, data }) {
        const existing = workItems.get(where.id);
        if (!existing) return null;

        const updated: WorkItem = {
          ...existing,
          title: data.title ?? existing.title,
          description: data.description !== undefined ? data.description : existing.description,
          status: data.status ?? existing.status,
          priority: data.priority ?? existing.priority,
          updatedAt: data.updatedAt ?? existing.updatedAt,
        };
        workItems.set(where.id, copyWorkItem(updated));
        return copyWorkItem(updated);
      },

      async delete({ where }) {
        return workItems.delete(where.id);
      },
    },

    user: {
      async findUnique({ where }) {
        const user = findUser(users, where);
        return user ? copyUser(user) : null;
      },

      async create({ data }) {
        if (findUser(users, { username: data.username }) || findUser(users, { email: data.email })) {
          throw new ConflictError('Username or email is already registered');
        }
        users.set(data.id, copyUser(data));
        return copyUser(data);
      },
    },

    async ping() {},

    async close() {
      workItems.clear();
      users.clear();
    },
  };
}
