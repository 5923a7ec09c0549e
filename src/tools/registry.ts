import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import { log } from '../logging.js';
import type { SessionContext } from '../session.js';
import { shapeToolResponse, toCallToolResult } from './response.js';
import type { StructuredContent, ToolReturnKind, ToolRun } from './response.js';

/**
 * Hidden per-call switch asking for raw text alongside structured content.
 * It is removed before validation and never listed in an input schema.
 */
export const RAW_CONTENT_FLAG = 'raw_content';

/** Request-scoped access to the shared session. */
export interface ToolContext {
  session: SessionContext;
}

interface ToolDefinitionBase<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  /** Public JSON schema shown to agents. */
  inputSchema: Tool['inputSchema'];
  argsSchema: S;
}

export type ToolDefinition<S extends z.ZodTypeAny> = ToolDefinitionBase<S> & (
  | { returns: 'mapping'; handler: (args: z.infer<S>, ctx: ToolContext) => Promise<StructuredContent> }
  | { returns: 'value'; handler: (args: z.infer<S>, ctx: ToolContext) => Promise<unknown> }
  | { returns: 'none'; handler: (args: z.infer<S>, ctx: ToolContext) => Promise<void> }
);

export interface RegisteredTool {
  readonly descriptor: Tool;
  readonly returns: ToolReturnKind;
  call(args: Record<string, unknown> | undefined, ctx: ToolContext): Promise<CallToolResult>;
}

export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

function formatIssue(error: z.ZodError): string {
  const issue = error.errors[0];
  if (!issue) {
    return 'invalid input';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

function bindRun<S extends z.ZodTypeAny>(
  definition: ToolDefinition<S>,
  args: z.infer<S>,
  ctx: ToolContext
): ToolRun {
  switch (definition.returns) {
    case 'mapping': {
      const handler = definition.handler;
      return { kind: 'mapping', run: () => handler(args, ctx) };
    }
    case 'value': {
      const handler = definition.handler;
      return { kind: 'value', run: () => handler(args, ctx) };
    }
    case 'none': {
      const handler = definition.handler;
      return { kind: 'none', run: () => handler(args, ctx) };
    }
  }
}

/**
 * The single registration path for tools: strips the raw-content flag,
 * validates arguments, and runs the handler through the response adapter.
 */
export function adaptTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
  const descriptor: Tool = {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
  };

  return {
    descriptor,
    returns: definition.returns,
    async call(rawArgs, ctx) {
      const input: Record<string, unknown> = rawArgs ?? {};
      const { [RAW_CONTENT_FLAG]: rawContent, ...args } = input;

      const validation = definition.argsSchema.safeParse(args);
      if (!validation.success) {
        const message = `Invalid arguments for ${definition.name}: ${formatIssue(validation.error)}`;
        log('Error', { message });
        return errorResult(message);
      }

      const response = await shapeToolResponse(
        bindRun(definition, validation.data, ctx),
        rawContent === true
      );
      if (!response.ok) {
        log('Tool execution failed', { tool: definition.name, message: response.text });
      }
      return toCallToolResult(response);
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: readonly RegisteredTool[]) {
    for (const tool of tools) {
      if (this.tools.has(tool.descriptor.name)) {
        throw new Error(`Duplicate tool name: ${tool.descriptor.name}`);
      }
      this.tools.set(tool.descriptor.name, tool);
    }
  }

  list(): Tool[] {
    return [...this.tools.values()].map((tool) => tool.descriptor);
  }

  get size(): number {
    return this.tools.size;
  }

  async call(
    name: string,
    args: Record<string, unknown> | undefined,
    ctx: ToolContext
  ): Promise<CallToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      log('Error', { message: `Unknown tool: ${name}` });
      return errorResult(`Unknown tool: ${name}`);
    }
    return tool.call(args, ctx);
  }
}
