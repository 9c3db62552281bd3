import { errorMessage, type Logger } from '@registry-lens/engine';

export interface ToolResponse {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}

/** Strings pass through as text; errors become isError results; anything else is pretty JSON */
export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: 'text', text: JSON.stringify({ error: result.message }) }],
      isError: true,
    };
  }
  const text = typeof result === 'string' ? result : JSON.stringify(result, null, 2);
  return { content: [{ type: 'text', text }] };
}

export async function respond(tool: string, log: Logger, work: () => Promise<unknown>): Promise<ToolResponse> {
  try {
    return wrapResponse(await work());
  } catch (err) {
    log.warn('Tool failed', { tool, error: errorMessage(err) });
    return wrapResponse(err instanceof Error ? err : new Error(String(err)));
  }
}
