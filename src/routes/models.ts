import type { FastifyPluginAsync } from 'fastify';

export interface ModelRouteOptions {
  models: string[];
}

export const modelRoutes: FastifyPluginAsync<ModelRouteOptions> = async (server, opts) => {
  // Public: OpenAI-style model list for chat clients.
  server.get('/models', async () => {
    const created = Math.floor(Date.now() / 1000);
    return {
      object: 'list',
      data: opts.models.map((id) => ({
        id,
        object: 'model',
        created,
        owned_by: 'billing-agent',
      })),
    };
  });
};
