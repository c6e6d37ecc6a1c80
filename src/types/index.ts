/**
 * Shared type definitions.
 */

export * from './core';
export type { MCPTool } from './tool';
export type { ToolContext } from '../mcp/context';
