import { type Failure, toFailure } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ToolResult } from './types.js';

export function ok(msg: string, data: Record<string, unknown> = {}): ToolResult {
  const structured = { ok: true, _msg: msg, ...data };
  return {
    content: [{ type: 'text', text: JSON.stringify(structured, null, 2) }],
    structuredContent: structured,
  };
}

export function failureResult(failure: Failure): ToolResult {
  return {
    isError: true,
    content: [{ type: 'text', text: `${failure.kind}: ${failure.error}` }],
    structuredContent: failure,
  };
}

/** Convert anything thrown by a service into a structured tool failure. */
export function errorResult(tool: string, error: unknown): ToolResult {
  const failure = toFailure(error);
  if (failure.kind === 'Internal') {
    void logger.error(tool, { message: 'Tool failed unexpectedly', error: failure.error });
  } else {
    void logger.info(tool, { message: failure.error, kind: failure.kind });
  }
  return failureResult(failure);
}
