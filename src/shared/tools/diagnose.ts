import { access } from 'node:fs/promises';
import { toolsMetadata } from '../../config/metadata.js';
import { EmptyInputSchema } from '../../schemas/inputs.js';
import { errorResult, ok } from './result.js';
import { defineTool } from './types.js';

export const diagnoseTool = defineTool({
  name: toolsMetadata.diagnose_audio_system.name,
  title: toolsMetadata.diagnose_audio_system.title,
  description: toolsMetadata.diagnose_audio_system.description,
  inputSchema: EmptyInputSchema,
  annotations: {
    title: toolsMetadata.diagnose_audio_system.title,
    readOnlyHint: true,
    idempotentHint: true,
    openWorldHint: false,
  },

  handler: async (_args, { services }) => {
    try {
      const report = await services.engine.diagnose();
      const directory = services.library.rootDir;
      let directoryExists = true;
      try {
        await access(directory);
      } catch {
        directoryExists = false;
        report.errors.push(`Music directory not found: ${directory}`);
      }

      const msg = report.available
        ? `${report.engine} ${report.version ?? ''} is available`.replace(/\s+/g, ' ')
        : `${report.engine} is not available; install it or set MPV_PATH`;

      return ok(msg, {
        engine: report.engine,
        available: report.available,
        version: report.version,
        binary: report.binary,
        supported_formats: report.supportedFormats,
        music_directory: directory,
        music_directory_exists: directoryExists,
        volume: services.controller.state.volume,
        errors: report.errors,
      });
    } catch (error) {
      return errorResult('diagnose_audio_system', error);
    }
  },
});
