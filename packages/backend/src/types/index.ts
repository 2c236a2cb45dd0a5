// Work item enums. Values double as the wire and database representation.
export const WorkItemStatus = {
  Todo: 'Todo',
  InProgress: 'InProgress',
  Done: 'Done',
} as const;

export type WorkItemStatus = (typeof WorkItemStatus)[keyof typeof WorkItemStatus];

export const WorkItemPriority = {
  Low: 'Low',
  Medium: 'Medium',
  High: 'High',
} as const;

export type WorkItemPriority = (typeof WorkItemPriority)[keyof typeof WorkItemPriority];

export function isWorkItemStatus(value: string): value is WorkItemStatus {
  return Object.values<string>(WorkItemStatus).includes(value);
}

export function isWorkItemPriority(value: string): value is WorkItemPriority {
  return Object.values<string>(WorkItemPriority).includes(value);
}

export interface WorkItem {
  id: string;
  title: string;
  description: string | null;
  status: WorkItemStatus;
  priority: WorkItemPriority;
  createdAt: Date;
  updatedAt: Date;
}

export interface User {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  createdAt: Date;
}

// Sorting
export type WorkItemSortField = 'title' | 'createdAt';
export type SortDirection = 'asc' | 'desc';

// Pagination
export interface PagedResult<T> {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
  hasNextPage: boolean;
  hasPreviousPage: boolean;
}

export interface WorkItemFilters {
  status?: WorkItemStatus;
  priority?: WorkItemPriority;
  sortBy?: WorkItemSortField;
  sortDir?: SortDirection;
  page?: number;
  pageSize?: number;
}
