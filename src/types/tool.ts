import type { z, ZodRawShape } from 'zod';
import type { Result } from './core';
import type { ToolContext } from '@/mcp/context';

/**
 * Unified tool interface for all MCP tools
 */
export interface MCPTool<TSchema extends z.AnyZodObject = z.AnyZodObject> {
  /** Unique tool identifier */
  name: string;

  /** Discovery text shown to MCP clients */
  description: string;

  /** Raw Zod schema shape for MCP registration */
  inputSchema: ZodRawShape;

  /** Zod schema for validation */
  schema: TSchema;

  /** Parse and validate untyped arguments (throws on invalid input) */
  parse(args: unknown): z.infer<TSchema>;

  /** Tool handler with pre-validated input; resolves to the text returned to the client */
  handler(input: z.infer<TSchema>, context: ToolContext): Promise<Result<string>>;
}

/**
 * Lightweight helper to create tools with reduced boilerplate
 * Derives inputSchema and parse from the Zod object schema
 */
export function tool<TSchema extends z.AnyZodObject>(config: {
  name: string;
  description: string;
  schema: TSchema;
  handler: (input: z.infer<TSchema>, context: ToolContext) => Promise<Result<string>>;
}): MCPTool<TSchema> {
  return {
    ...config,
    inputSchema: config.schema.shape,
    parse: (args: unknown) => config.schema.parse(args),
  };
}
