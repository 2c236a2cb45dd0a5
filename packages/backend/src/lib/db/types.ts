import type {
  SortDirection,
  User,
  WorkItem,
  WorkItemPriority,
  WorkItemSortField,
  WorkItemStatus,
} from '../../types/index.js';

/**
 * Equality predicates combined with AND. Absent keys do not filter.
 */
export interface WorkItemWhere {
  status?: WorkItemStatus;
  priority?: WorkItemPriority;
}

export interface WorkItemOrderBy {
  field: WorkItemSortField;
  direction: SortDirection;
}

export interface WorkItemFindManyArgs {
  where?: WorkItemWhere;
  orderBy: WorkItemOrderBy;
  skip: number;
  take: number;
}

export type WorkItemUpdateData = Partial<
  Pick<WorkItem, 'title' | 'description' | 'status' | 'priority' | 'updatedAt'>
>;

export interface WorkItemDelegate {
  findMany(args: WorkItemFindManyArgs): Promise<WorkItem[]>;
  count(args?: { where?: WorkItemWhere }): Promise<number>;
  findUnique(args: { where: { id: string } }): Promise<WorkItem | null>;
  create(args: { data: WorkItem }): Promise<WorkItem>;
  /** Resolves to null when no row has the id. */
  update(args: { where: { id: string }; data: WorkItemUpdateData }): Promise<WorkItem | null>;
  /** Resolves to false when no row has the id. */
  delete(args: { where: { id: string } }): Promise<boolean>;
}

export type UserWhereUnique = { id: string } | { username: string } | { email: string };

export interface UserDelegate {
  findUnique(args: { where: UserWhereUnique }): Promise<User | null>;
  /** Rejects with ConflictError when the username or email is taken. */
  create(args: { data: User }): Promise<User>;
}

/**
 * Persistence context the services depend on. One delegate per table.
 */
export interface DataContext {
  readonly kind: 'postgres' | 'memory';
  workItem: WorkItemDelegate;
  user: UserDelegate;
  /** Rejects when the store is unreachable. */
  ping(): Promise<void>;
  close(): Promise<void>;
}
