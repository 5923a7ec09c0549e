import { AUTH_TOOLS } from './auth.js';
import { DRIVE_TOOLS } from './drive.js';
import { ToolRegistry } from './registry.js';
import type { RegisteredTool } from './registry.js';
import { SHEETS_TOOLS } from './sheets.js';

export const ALL_TOOLS: readonly RegisteredTool[] = [...SHEETS_TOOLS, ...DRIVE_TOOLS, ...AUTH_TOOLS];

export function createToolRegistry(tools: readonly RegisteredTool[] = ALL_TOOLS): ToolRegistry {
  return new ToolRegistry(tools);
}
