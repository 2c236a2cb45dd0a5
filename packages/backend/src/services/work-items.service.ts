import { randomUUID } from 'crypto';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import type { DataContext, WorkItemOrderBy, WorkItemWhere } from '../lib/db/index.js';
import {
  WorkItemPriority,
  WorkItemStatus,
  type PagedResult,
  type WorkItem,
  type WorkItemFilters,
} from '../types/index.js';
import {
  MAX_PAGE_SIZE,
  type CreateWorkItemInput,
  type UpdateWorkItemInput,
} from '../schemas/work-items.schema.js';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;

export interface WorkItemResponse {
  id: string;
  title: string;
  description: string | null;
  status: WorkItemStatus;
  priority: WorkItemPriority;
  createdAt: string;
  updatedAt: string;
}

/**
 * Transform a work item into its JSON shape (ISO-8601 timestamps).
 */
export function toWorkItemResponse(item: WorkItem): WorkItemResponse {
  return {
    id: item.id,
    title: item.title,
    description: item.description,
    status: item.status,
    priority: item.priority,
    createdAt: item.createdAt.toISOString(),
    updatedAt: item.updatedAt.toISOString(),
  };
}

/**
 * createdAt sorts newest first unless told otherwise; title sorts A→Z.
 */
export function resolveOrderBy(filters: Pick<WorkItemFilters, 'sortBy' | 'sortDir'>): WorkItemOrderBy {
  const field = filters.sortBy ?? 'createdAt';
  const direction = filters.sortDir ?? (field === 'title' ? 'asc' : 'desc');
  return { field, direction };
}

function requireTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Title is required', { field: 'title' });
  }
  return trimmed;
}

function requirePositiveInteger(name: string, value: number, max?: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer`, { field: name, value });
  }
  if (max !== undefined && value > max) {
    throw new ValidationError(`${name} must not exceed ${max}`, { field: name, value });
  }
  return value;
}

export class WorkItemService {
  constructor(
    private readonly db: DataContext,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Get a work item by ID.
   */
  async getById(id: string): Promise<WorkItem> {
    const item = await this.db.workItem.findUnique({ where: { id } });

    if (!item) {
      throw new NotFoundError('WorkItem', id);
    }

    return item;
  }

  /**
   * List work items with optional status/priority filters, sorting and pagination.
   * A page past the end yields an empty `items` array.
   */
  async getAll(filters: WorkItemFilters = {}): Promise<PagedResult<WorkItem>> {
    const page = requirePositiveInteger('page', filters.page ?? DEFAULT_PAGE);
    const pageSize = requirePositiveInteger(
      'pageSize',
      filters.pageSize ?? DEFAULT_PAGE_SIZE,
      MAX_PAGE_SIZE
    );

    const where: WorkItemWhere = {};
    if (filters.status) {
      where.status = filters.status;
    }
    if (filters.priority) {
      where.priority = filters.priority;
    }

    const skip = (page - 1) * pageSize;
    const totalCount = await this.db.workItem.count({ where });

    // Past the last row there is nothing to fetch, and the offset may not fit the store
    const items =
      skip < totalCount
        ? await this.db.workItem.findMany({
            where,
            orderBy: resolveOrderBy(filters),
            skip,
            take: pageSize,
          })
        : [];

    const totalPages = Math.ceil(totalCount / pageSize);

    return {
      items,
      totalCount,
      page,
      pageSize,
      totalPages,
      hasNextPage: page < totalPages,
      hasPreviousPage: page > 1,
    };
  }

  /**
   * Create a work item. New items always start in Todo.
   */
  async create(data: CreateWorkItemInput): Promise<WorkItem> {
    const timestamp = this.now();

    return this.db.workItem.create({
      data: {
        id: randomUUID(),
        title: requireTitle(data.title),
        description: data.description ?? null,
        status: WorkItemStatus.Todo,
        priority: data.priority ?? WorkItemPriority.Medium,
        createdAt: timestamp,
        updatedAt: timestamp,
      },
    });
  }

  /**
   * Replace the supplied fields; anything left undefined keeps its value.
   * `description: null` clears the description.
   */
  async update(id: string, data: UpdateWorkItemInput): Promise<WorkItem> {
    await this.getById(id);

    const updated = await this.db.workItem.update({
      where: { id },
      data: {
        title: data.title !== undefined ? requireTitle(data.title) : undefined,
        description: data.description,
        status: data.status,
        priority: data.priority,
        updatedAt: this.now(),
      },
    });

    // Removed between the existence check and the write
    if (!updated) {
      throw new NotFoundError('WorkItem', id);
    }

    return updated;
  }

  /**
   * Delete a work item.
   */
  async delete(id: string): Promise<void> {
    await this.getById(id);

    const deleted = await this.db.workItem.delete({ where: { id } });

    if (!deleted) {
      throw new NotFoundError('WorkItem', id);
    }
  }
}
