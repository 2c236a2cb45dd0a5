import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  CreateWorkItemSchema,
  UpdateWorkItemSchema,
  WorkItemFiltersSchema,
  WorkItemIdParamsSchema,
} from '../schemas/work-items.schema.js';
import { WorkItemService, toWorkItemResponse } from '../services/work-items.service.js';

export async function workItemsRoutes(fastify: FastifyInstance) {
  const workItemService = new WorkItemService(fastify.db);

  // Apply authentication to all routes in this plugin
  fastify.addHook('onRequest', fastify.authenticate);

  // GET /api/workitems - List work items
  fastify.get(
    '/api/workitems',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const filters = WorkItemFiltersSchema.parse(request.query);
      const result = await workItemService.getAll(filters);

      return reply.status(200).send({
        ...result,
        items: result.items.map(toWorkItemResponse),
      });
    }
  );

  // GET /api/workitems/:id - Get single work item
  fastify.get(
    '/api/workitems/:id',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { id } = WorkItemIdParamsSchema.parse(request.params);
      const item = await workItemService.getById(id);
      return reply.status(200).send(toWorkItemResponse(item));
    }
  );

  // POST /api/workitems - Create work item
  fastify.post(
    '/api/workitems',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const data = CreateWorkItemSchema.parse(request.body);
      const item = await workItemService.create(data);
      request.log.info({ workItemId: item.id }, 'Work item created');
      return reply.status(201).send(toWorkItemResponse(item));
    }
  );

  // PUT /api/workitems/:id - Update work item
  fastify.put(
    '/api/workitems/:id',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { id } = WorkItemIdParamsSchema.parse(request.params);
      const data = UpdateWorkItemSchema.parse(request.body);
      const item = await workItemService.update(id, data);
      return reply.status(200).send(toWorkItemResponse(item));
    }
  );

  // DELETE /api/workitems/:id - Delete work item
  fastify.delete(
    '/api/workitems/:id',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { id } = WorkItemIdParamsSchema.parse(request.params);
      await workItemService.delete(id);
      request.log.info({ workItemId: id }, 'Work item deleted');
      return reply.status(204).send();
    }
  );
}
