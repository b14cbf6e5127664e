#!/usr/bin/env node
import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { clientFromEnv } from './client.js';
import { registerFundTools } from './tools/etf.js';
import { registerNewsTools } from './tools/news.js';

const server = new McpServer({
  name: 'fmp-market-data',
  version: '0.1.0',
});

const client = clientFromEnv();
registerFundTools(server, client);
registerNewsTools(server, client);

const transport = new StdioServerTransport();
await server.connect(transport);
