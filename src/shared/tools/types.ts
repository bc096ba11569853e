import type { CallToolResult, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import type { ZodObject, ZodRawShape, z } from 'zod';
import type { AudioServices } from '../../core/services.js';

export type ToolResult = CallToolResult;

export interface ToolContext {
  sessionId: string;
  signal?: AbortSignal;
  meta?: {
    progressToken?: string | number;
    requestId?: string;
  };
  services: AudioServices;
}

export interface SharedToolDefinition<TShape extends ZodRawShape> {
  name: string;
  title?: string;
  description: string;
  inputSchema: ZodObject<TShape>;
  outputSchema?: ZodRawShape;
  annotations?: ToolAnnotations;
  handler: (args: z.output<ZodObject<TShape>>, context: ToolContext) => Promise<ToolResult>;
}

export type ParsedInput =
  | { success: true; run: (context: ToolContext) => Promise<ToolResult> }
  | { success: false; issues: string[] };

/**
 * Type-erased tool as stored in the registry. `parse` validates raw
 * arguments and binds them to the typed handler.
 */
export interface RegisteredTool {
  name: string;
  title?: string;
  description: string;
  inputShape: ZodRawShape;
  outputSchema?: ZodRawShape;
  annotations?: ToolAnnotations;
  parse: (args: unknown) => ParsedInput;
}

export function defineTool<TShape extends ZodRawShape>(
  definition: SharedToolDefinition<TShape>,
): RegisteredTool {
  const { inputSchema, handler, ...rest } = definition;
  return {
    ...rest,
    inputShape: inputSchema.shape,
    parse: (args) => {
      const parsed = inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        return {
          success: false,
          issues: parsed.error.errors.map((e) =>
            e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message,
          ),
        };
      }
      const data = parsed.data;
      return { success: true, run: (context) => handler(data, context) };
    },
  };
}
