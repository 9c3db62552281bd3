import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  Orchestrator,
  createLogger,
  type Logger,
  type RegistryClient,
  type UsageTracker,
} from '@registry-lens/engine';
import { registerAnalysisTools } from './tools/analysis.js';
import { registerRegistryTools } from './tools/registry.js';

export const SERVER_NAME = 'registry-lens';
export const SERVER_VERSION = '0.1.0';

export interface ServerDeps {
  client: RegistryClient;
  /** Built over the client when omitted */
  orchestrator?: Orchestrator;
  usage?: UsageTracker;
  logger?: Logger;
}

export function createServer(deps: ServerDeps): McpServer {
  const logger = deps.logger ?? createLogger('McpServer');
  const orchestrator = deps.orchestrator ?? new Orchestrator({
    client: deps.client,
    usage: deps.usage,
    logger: createLogger('Orchestrator'),
  });

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerAnalysisTools(server, { orchestrator, logger });
  registerRegistryTools(server, { client: deps.client, usage: deps.usage, logger });

  return server;
}
