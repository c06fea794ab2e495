import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { PipelineHandle } from '../../application/index.js';

export interface PipelinePluginOptions {
  handle: PipelineHandle;
}

/**
 * Fastify plugin exposing a running pipeline to routes.
 *
 * Decorates `fastify.pipeline`. The pipeline's lifetime is owned by the
 * caller; closing the server does not stop it.
 */
async function pipelinePlugin(fastify: FastifyInstance, opts: PipelinePluginOptions): Promise<void> {
  fastify.decorate('pipeline', opts.handle);
}

export default fp(pipelinePlugin, {
  name: 'pipeline',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.pipeline` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    pipeline: PipelineHandle;
  }
}
