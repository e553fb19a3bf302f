import type { FastifyPluginAsync } from 'fastify';
import type { ToolRegistry } from '../services/tools/index.js';

export interface ToolRoutesOptions {
  registry: ToolRegistry;
}

// Public: the tool declarations advertised to the reasoning service, in order.
export const toolRoutes: FastifyPluginAsync<ToolRoutesOptions> = async (server, options) => {
  server.get('/tools', async () => {
    return { tools: options.registry.toOpenAIFunctions() };
  });
};
