#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { InMemoryUsageTracker, createLogger, createRegistryClient, loadConfig } from '@registry-lens/engine';
import { createServer } from './server.js';

const config = loadConfig();
const logger = createLogger('McpServer', { level: config.logLevel });

const server = createServer({
  client: createRegistryClient(config),
  usage: new InMemoryUsageTracker(),
  logger,
});

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info('Listening on stdio');
