import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { describeError } from '../logging.js';

export type StructuredContent = { [key: string]: unknown };

/**
 * What a tool declares about its result:
 * - `mapping`: an object used as structured content as-is
 * - `value`: any value, always wrapped as `{ result: value }`
 * - `none`: nothing; structured content is never produced
 */
export type ToolReturnKind = 'mapping' | 'value' | 'none';

export type ToolRun =
  | { kind: 'mapping'; run: () => Promise<StructuredContent> }
  | { kind: 'value'; run: () => Promise<unknown> }
  | { kind: 'none'; run: () => Promise<void> };

export type ToolResponse =
  | { ok: true; structured?: StructuredContent; text?: string }
  | { ok: false; text: string };

export const FAILURE_PREFIX = 'Tool execution failed: ';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Text form of a tool result: `null` for absent values, the plain text of
 * primitives, compact JSON for arrays and plain objects, and `String()` for
 * anything else.
 */
export function stringifyResult(value: unknown): string {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) || isPlainObject(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

async function execute(tool: ToolRun): Promise<{ value: unknown; structured?: StructuredContent }> {
  switch (tool.kind) {
    case 'mapping': {
      const value = await tool.run();
      return { value, structured: value };
    }
    case 'value': {
      const value = await tool.run();
      return { value, structured: { result: value } };
    }
    case 'none': {
      const value: unknown = await tool.run();
      return { value };
    }
  }
}

/**
 * Run a tool body and decide the shape of what goes back to the agent.
 * Never throws: a failing body becomes a text-only failure response whether
 * or not raw text was requested.
 */
export async function shapeToolResponse(tool: ToolRun, rawContentRequested: boolean): Promise<ToolResponse> {
  let outcome: { value: unknown; structured?: StructuredContent };
  try {
    outcome = await execute(tool);
  } catch (error) {
    return { ok: false, text: `${FAILURE_PREFIX}${describeError(error)}` };
  }

  const response: { ok: true; structured?: StructuredContent; text?: string } = { ok: true };
  if (outcome.structured !== undefined) {
    response.structured = outcome.structured;
  }
  if (rawContentRequested) {
    response.text = stringifyResult(outcome.value);
  }
  return response;
}

export function toCallToolResult(response: ToolResponse): CallToolResult {
  if (!response.ok) {
    return {
      content: [{ type: 'text', text: response.text }],
      isError: true,
    };
  }

  const result: CallToolResult = {
    content: response.text !== undefined ? [{ type: 'text', text: response.text }] : [],
  };
  if (response.structured !== undefined) {
    result.structuredContent = response.structured;
  }
  return result;
}
