import { toolsMetadata } from '../../config/metadata.js';
import { HealthInputSchema } from '../../schemas/inputs.js';
import { HealthOutput } from '../../schemas/outputs.js';
import { ok } from './result.js';
import { defineTool } from './types.js';

/**
 * Health check tool.
 */
export const healthTool = defineTool({
  name: toolsMetadata.health.name,
  title: toolsMetadata.health.title,
  description: toolsMetadata.health.description,
  inputSchema: HealthInputSchema,
  outputSchema: HealthOutput.shape,
  annotations: {
    title: 'Server Health Check',
    readOnlyHint: true,
    destructiveHint: false,
    idempotentHint: true,
    openWorldHint: false,
  },
  handler: async (args, { services }) => {
    const result: Record<string, unknown> = {
      status: 'ok',
      timestamp: Date.now(),
      runtime: 'node',
    };

    if (args.verbose) {
      result.uptime = Math.floor((Date.now() - services.startedAt) / 1000);
      result.nodeVersion = process.version;
      result.memoryUsage = process.memoryUsage().heapUsed;
    }

    return ok('Server is healthy', result);
  },
});
