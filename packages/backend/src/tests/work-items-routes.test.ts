import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { authHeader, buildTestApp, mockData, parseJsonResponse, testUuid } from './setup.js';
import { createMemoryContext, type DataContext } from '../lib/db/index.js';
import type { WorkItemResponse } from '../services/work-items.service.js';
import type { PagedResult } from '../types/index.js';

interface ErrorBody {
  error: string;
  message: string;
  statusCode: number;
  details?: Array<{ path: string; message: string }>;
}

describe('Work item routes', () => {
  let db: DataContext;
  let app: FastifyInstance;
  let headers: { authorization: string };

  beforeEach(async () => {
    db = createMemoryContext({
      workItems: [
        mockData.workItem({
          id: testUuid('1'),
          title: 'Charlie',
          status: 'Todo',
          priority: 'High',
          createdAt: new Date('2024-01-01T00:00:00.000Z'),
        }),
        mockData.workItem({
          id: testUuid('2'),
          title: 'Alpha',
          status: 'Done',
          priority: 'Low',
          createdAt: new Date('2024-01-02T00:00:00.000Z'),
        }),
        mockData.workItem({
          id: testUuid('3'),
          title: 'Bravo',
          status: 'Todo',
          priority: 'Low',
          createdAt: new Date('2024-01-03T00:00:00.000Z'),
        }),
      ],
    });
    app = await buildTestApp(db);
    headers = await authHeader();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('authentication', () => {
    it('returns 401 without a token', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/workitems' });

      expect(res.statusCode).toBe(401);
      expect(parseJsonResponse<ErrorBody>(res)).toEqual({
        error: 'Unauthorized',
        message: 'Access token required',
        statusCode: 401,
      });
    });

    it('returns 401 for a token signed with another secret', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems',
        headers: { authorization: 'Bearer not-a-real-token' },
      });

      expect(res.statusCode).toBe(401);
      expect(parseJsonResponse<ErrorBody>(res).message).toBe('Invalid or expired access token');
    });

    it('accepts the token from the access_token cookie', async () => {
      const token = headers.authorization.slice('Bearer '.length);
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems',
        cookies: { access_token: token },
      });

      expect(res.statusCode).toBe(200);
    });
  });

  describe('GET /api/workitems', () => {
    it('lists newest first with pagination metadata', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/workitems', headers });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<PagedResult<WorkItemResponse>>(res);
      expect(body.items.map((item) => item.title)).toEqual(['Bravo', 'Alpha', 'Charlie']);
      expect(body.totalCount).toBe(3);
      expect(body.page).toBe(1);
      expect(body.pageSize).toBe(10);
      expect(body.totalPages).toBe(1);
      expect(body.hasNextPage).toBe(false);
      expect(body.hasPreviousPage).toBe(false);
      expect(body.items[0].createdAt).toBe('2024-01-03T00:00:00.000Z');
    });

    it('applies filters, sorting and paging from the query string', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems?status=todo&sortBy=title&sortDir=asc&page=1&pageSize=1',
        headers,
      });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<PagedResult<WorkItemResponse>>(res);
      expect(body.items.map((item) => item.title)).toEqual(['Bravo']);
      expect(body.totalCount).toBe(2);
      expect(body.totalPages).toBe(2);
      expect(body.hasNextPage).toBe(true);
    });

    it('filters by priority', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems?priority=Low',
        headers,
      });

      const body = parseJsonResponse<PagedResult<WorkItemResponse>>(res);
      expect(body.items.map((item) => item.id)).toEqual([testUuid('3'), testUuid('2')]);
    });

    it('returns 400 for an unknown status', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems?status=Blocked',
        headers,
      });

      expect(res.statusCode).toBe(400);
      const body = parseJsonResponse<ErrorBody>(res);
      expect(body.error).toBe('Validation Error');
      expect(body.details?.[0].path).toBe('status');
    });

    it('returns 400 for an unsupported sort field', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems?sortBy=priority',
        headers,
      });

      expect(res.statusCode).toBe(400);
    });

    it('returns an empty page far past the end', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems?page=1000000',
        headers,
      });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<PagedResult<WorkItemResponse>>(res);
      expect(body.items).toEqual([]);
      expect(body.totalCount).toBe(3);
      expect(body.page).toBe(1000000);
    });

    it('returns 400 for a page beyond the safe integer range', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems?page=10000000000000000000',
        headers,
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).details?.[0].path).toBe('page');
    });

    it('returns 400 for page 0', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems?page=0',
        headers,
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).details?.[0].path).toBe('page');
    });
  });

  describe('GET /api/workitems/:id', () => {
    it('returns the work item', async () => {
      const res = await app.inject({
        method: 'GET',
        url: `/api/workitems/${testUuid('2')}`,
        headers,
      });

      expect(res.statusCode).toBe(200);
      expect(parseJsonResponse<WorkItemResponse>(res)).toEqual({
        id: testUuid('2'),
        title: 'Alpha',
        description: 'Test description',
        status: 'Done',
        priority: 'Low',
        createdAt: '2024-01-02T00:00:00.000Z',
        updatedAt: '2024-01-02T00:00:00.000Z',
      });
    });

    it('returns 404 for an unknown id', async () => {
      const res = await app.inject({
        method: 'GET',
        url: `/api/workitems/${testUuid('404')}`,
        headers,
      });

      expect(res.statusCode).toBe(404);
      expect(parseJsonResponse<ErrorBody>(res)).toEqual({
        error: 'Not Found',
        message: `WorkItem with id '${testUuid('404')}' not found`,
        statusCode: 404,
      });
    });

    it('returns 400 for a malformed id', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/api/workitems/not-a-uuid',
        headers,
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).details).toEqual([
        { path: 'id', message: 'Invalid work item ID' },
      ]);
    });
  });

  describe('POST /api/workitems', () => {
    it('creates a work item in Todo', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/workitems',
        headers,
        payload: { title: 'New Task', priority: 'high' },
      });

      expect(res.statusCode).toBe(201);
      const body = parseJsonResponse<WorkItemResponse>(res);
      expect(body.title).toBe('New Task');
      expect(body.status).toBe('Todo');
      expect(body.priority).toBe('High');
      expect(body.description).toBeNull();
      expect(body.createdAt).toBe(body.updatedAt);
      expect(await db.workItem.count()).toBe(4);
    });

    it('ignores a status supplied on create', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/workitems',
        headers,
        payload: { title: 'New Task', status: 'Done' },
      });

      expect(parseJsonResponse<WorkItemResponse>(res).status).toBe('Todo');
    });

    it('returns 400 for an empty title', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/workitems',
        headers,
        payload: { title: '' },
      });

      expect(res.statusCode).toBe(400);
      expect(parseJsonResponse<ErrorBody>(res).details).toEqual([
        { path: 'title', message: 'Title is required' },
      ]);
      expect(await db.workItem.count()).toBe(3);
    });
  });

  describe('PUT /api/workitems/:id', () => {
    it('applies a partial update', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: `/api/workitems/${testUuid('1')}`,
        headers,
        payload: { status: 'InProgress' },
      });

      expect(res.statusCode).toBe(200);
      const body = parseJsonResponse<WorkItemResponse>(res);
      expect(body.status).toBe('InProgress');
      expect(body.title).toBe('Charlie');
      expect(body.priority).toBe('High');
      expect(body.createdAt).toBe('2024-01-01T00:00:00.000Z');
      expect(body.updatedAt).not.toBe('2024-01-01T00:00:00.000Z');
    });

    it('returns 404 for an unknown id', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: `/api/workitems/${testUuid('404')}`,
        headers,
        payload: { title: 'Updated' },
      });

      expect(res.statusCode).toBe(404);
    });
  });

  describe('DELETE /api/workitems/:id', () => {
    it('deletes the work item', async () => {
      const res = await app.inject({
        method: 'DELETE',
        url: `/api/workitems/${testUuid('3')}`,
        headers,
      });

      expect(res.statusCode).toBe(204);
      expect(res.body).toBe('');

      const lookup = await app.inject({
        method: 'GET',
        url: `/api/workitems/${testUuid('3')}`,
        headers,
      });
      expect(lookup.statusCode).toBe(404);
    });

    it('returns 404 for an unknown id', async () => {
      const res = await app.inject({
        method: 'DELETE',
        url: `/api/workitems/${testUuid('404')}`,
        headers,
      });

      expect(res.statusCode).toBe(404);
    });
  });

  describe('GET /health', () => {
    it('reports the store in use', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(parseJsonResponse<{ status: string; store: string }>(res)).toEqual({
        status: 'ok',
        store: 'memory',
      });
    });

    it('answers 503 when the store cannot be reached', async () => {
      const unreachable: DataContext = {
        ...createMemoryContext(),
        ping: async () => {
          throw new Error('connection refused');
        },
      };
      const degraded = await buildTestApp(unreachable);

      try {
        const res = await degraded.inject({ method: 'GET', url: '/health' });

        expect(res.statusCode).toBe(503);
        expect(parseJsonResponse<{ status: string; store: string }>(res)).toEqual({
          status: 'unavailable',
          store: 'memory',
        });
      } finally {
        await degraded.close();
      }
    });
  });
});
