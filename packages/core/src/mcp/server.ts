#!/usr/bin/env node
/**
 * mindloop MCP server
 *
 * Exposes turn processing and the temperature state as MCP tools.
 *
 * Client settings:
 * {
 *   "mcpServers": {
 *     "mindloop": {
 *       "command": "node",
 *       "args": ["path/to/mindloop/packages/core/dist/mcp/server.js"],
 *       "env": { "MINDLOOP_ROOT": "/path/to/data", "OPENAI_API_KEY": "..." }
 *     }
 *   }
 * }
 */

import 'dotenv/config';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ActivityStore } from '../activity.js';
import { createCompletionClient, loadConfig } from '../config.js';
import { createBlender } from '../mind/blender.js';
import { TurnRunner } from '../orchestration/turn-runner.js';
import { ConversationStore } from '../store/conversations.js';
import { SettingsStore } from '../store/settings.js';
import { registerMindTools } from './tools.js';

const config = loadConfig();
const activity = new ActivityStore(config.dataRoot);
const settings = new SettingsStore(config.dataRoot);
const conversations = new ConversationStore(config.dataRoot);
const blender = createBlender({ dayDreamRule: config.dayDreamRule });

const runner = new TurnRunner({
  client: createCompletionClient(config),
  temperatures: settings,
  history: conversations,
  settings,
  dayDream: config.dayDream,
  blender,
  onActivity: activity.sink(),
});

const server = new McpServer({ name: 'mindloop', version: '0.1.0' });
registerMindTools(server, { runner, settings, conversations, activity, blender });

const transport = new StdioServerTransport();
await server.connect(transport);
console.error(`[mcp] mindloop ready (${config.provider}, data in ${config.dataRoot})`);
