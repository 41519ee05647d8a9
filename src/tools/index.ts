export * from './types.js';
export { ToolRegistry, normalizeToolName, parseToolDefinitions, loadToolRegistry } from './registry.js';
