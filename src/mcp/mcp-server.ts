/**
 * MCP Server Implementation
 * Register the knowledge tools and resources on an McpServer instance.
 */

import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { createErrorGuidance, extractErrorMessage } from '@/lib/errors';
import { createLogger, type Logger } from '@/lib/logger';
import type { KnowledgeStore } from '@/knowledge';
import {
  KNOWLEDGE_RESOURCES,
  readKnowledgeResource,
  resourceTemplate,
  type KnowledgeResource,
} from '@/resources/knowledge-resources';
import { ALL_TOOLS } from '@/tools';
import type { MCPTool } from '@/types/tool';
import { Failure, type ErrorGuidance, type Result } from '@/types';
import { createToolContext } from './context';

const ERROR_FORMAT = {
  HINT_PREFIX: '💡',
  RESOLUTION_PREFIX: '🔧',
  DEFAULT_RESOLUTION: 'Check logs for more information',
} as const;

const RESOURCE_MIME_TYPE = 'text/markdown';

/**
 * Server options
 */
export interface ServerOptions {
  name: string;
  version: string;
  /** Free-text guidance sent to clients on initialize */
  instructions?: string;
  logger?: Logger;
  tools?: readonly MCPTool[];
  resources?: readonly KnowledgeResource[];
}

/**
 * Format error message with guidance for tool failures
 */
export function formatErrorWithGuidance(error: string, guidance?: ErrorGuidance): string {
  if (!guidance) {
    return error || 'Tool execution failed';
  }

  const parts = [error];

  if (guidance.hint) {
    parts.push(`${ERROR_FORMAT.HINT_PREFIX} ${guidance.hint}`);
  }

  parts.push(
    `${ERROR_FORMAT.RESOLUTION_PREFIX} Resolution:`,
    guidance.resolution || ERROR_FORMAT.DEFAULT_RESOLUTION,
  );

  return parts.join('\n\n');
}

/**
 * Validate arguments and run a tool against a snapshot.
 * Invalid arguments come back as a Failure with the offending fields listed.
 */
export async function executeTool(
  tool: MCPTool,
  args: unknown,
  store: KnowledgeStore,
  logger: Logger,
): Promise<Result<string>> {
  try {
    const input = tool.parse(args ?? {});
    return await tool.handler(input, createToolContext(store, logger, tool.name));
  } catch (error) {
    if (error instanceof ZodError) {
      const fields = error.issues.map((issue) => issue.path.join('.') || '(root)');
      const message = `Invalid arguments for ${tool.name}`;
      return Failure(
        message,
        createErrorGuidance(
          message,
          `Check the fields: ${fields.join(', ')}`,
          'Call tools/list for the expected input schema',
          { issues: error.issues.map((issue) => issue.message) },
        ),
      );
    }
    throw error;
  }
}

/**
 * Register tools on a server. A failed result becomes an `isError` response with the guidance text;
 * anything thrown is raised as an MCP error.
 */
export function registerToolsWithServer(
  server: McpServer,
  tools: readonly MCPTool[],
  store: KnowledgeStore,
  logger: Logger,
): void {
  for (const tool of tools) {
    server.tool(tool.name, tool.description, tool.inputSchema, async (args) => {
      logger.debug({ tool: tool.name }, 'Executing tool');

      try {
        const result = await executeTool(tool, args, store, logger);

        if (!result.ok) {
          logger.warn({ tool: tool.name, error: result.error }, 'Tool returned a failure');
          return {
            content: [{ type: 'text' as const, text: formatErrorWithGuidance(result.error, result.guidance) }],
            isError: true,
          };
        }

        return {
          content: [{ type: 'text' as const, text: result.value }],
        };
      } catch (error) {
        logger.error({ error: extractErrorMessage(error), tool: tool.name }, 'Tool execution error');
        throw error instanceof McpError
          ? error
          : new McpError(ErrorCode.InternalError, extractErrorMessage(error));
      }
    });
  }
}

/**
 * Register the per-record resource templates
 */
export function registerResourcesWithServer(
  server: McpServer,
  resources: readonly KnowledgeResource[],
  store: KnowledgeStore,
  logger: Logger,
): void {
  for (const resource of resources) {
    server.resource(
      resource.name,
      new ResourceTemplate(resourceTemplate(resource), { list: undefined }),
      { description: resource.description, mimeType: RESOURCE_MIME_TYPE },
      async (uri, variables) => {
        const raw = variables[resource.variable];
        const key = Array.isArray(raw) ? raw.join(',') : (raw ?? '');

        logger.debug({ resource: resource.name, key }, 'Reading resource');

        return {
          contents: [
            {
              uri: uri.href,
              mimeType: RESOURCE_MIME_TYPE,
              text: readKnowledgeResource(store, resource, key),
            },
          ],
        };
      },
    );
  }
}

/**
 * Create an MCP server over the given snapshot with every knowledge tool and resource.
 */
export function createKnowledgeMcpServer(store: KnowledgeStore, options: ServerOptions): McpServer {
  const logger = options.logger ?? createLogger({ name: 'mcp-server' });
  const server = new McpServer(
    { name: options.name, version: options.version },
    options.instructions ? { instructions: options.instructions } : undefined,
  );

  registerToolsWithServer(server, options.tools ?? ALL_TOOLS, store, logger);
  registerResourcesWithServer(server, options.resources ?? KNOWLEDGE_RESOURCES, store, logger);

  return server;
}
