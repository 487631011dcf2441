import { API_TOOLS } from './api-tools.js';
import { DISCOVERY_TOOLS } from './discovery-tools.js';
import { ToolRegistry } from './registry.js';

/** All tools of the server: discovery and reference first, then remote API. */
export function createToolRegistry(): ToolRegistry {
  return new ToolRegistry([...DISCOVERY_TOOLS, ...API_TOOLS]);
}
