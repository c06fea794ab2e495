import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { logRecordInputSchema, logRecordBatchSchema, toLogRecord } from '../../application/index.js';

/**
 * Registers the log ingestion routes.
 *
 * POST /api/v1/logs        single record
 * POST /api/v1/logs/batch  array of records
 * GET  /api/v1/logs/stats  pipeline counters and queue state
 *
 * A full queue is not an error for the caller: the record is reported as
 * `dropped` with the same 202 status.
 */
async function logRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/logs',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = logRecordInputSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const result = fastify.pipeline.offer(toLogRecord(parsed.data));

      return reply.status(202).send({
        status: result === 'accepted' ? 'accepted' : 'dropped',
      });
    },
  );

  /**
   * Batch ingestion. The whole array is validated up-front; one invalid
   * record rejects the batch before anything is offered.
   */
  fastify.post(
    '/api/v1/logs/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = logRecordBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      let accepted = 0;
      let dropped = 0;
      for (const input of parsed.data) {
        if (fastify.pipeline.offer(toLogRecord(input)) === 'accepted') {
          accepted++;
        } else {
          dropped++;
        }
      }

      if (dropped > 0) {
        request.log.debug({ accepted, dropped }, 'Log batch partially dropped');
      }

      return reply.status(202).send({ status: 'accepted', accepted, dropped });
    },
  );

  fastify.get(
    '/api/v1/logs/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { pipeline } = fastify;
      return reply.status(200).send({
        counters: pipeline.counters(),
        queue: {
          queued: pipeline.queued,
          capacity: pipeline.capacity,
        },
        config: pipeline.config,
      });
    },
  );
}

export default fp(logRoutes, {
  name: 'log-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
