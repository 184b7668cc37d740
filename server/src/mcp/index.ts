#!/usr/bin/env node
/**
 * MCP Server Entry Point
 * Serves one local Abalone game over stdio. Stdout carries the protocol,
 * so everything is logged to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { DEFAULT_GAME_CONFIG, mergeConfig } from '../game/GameConfig.js';
import { GameSession } from '../game/GameSession.js';
import { createMCPServer } from './MCPServerSetup.js';

// Game-level settings may come from the environment, e.g. ABALONE_MODE=hva
function configFromEnv(env: NodeJS.ProcessEnv) {
  const update: Record<string, string> = {};
  if (env.ABALONE_MODE) update.mode = env.ABALONE_MODE;
  if (env.ABALONE_HUMAN_SIDE) update.humanSide = env.ABALONE_HUMAN_SIDE;
  if (env.ABALONE_AI_DEPTH) update.aiDepth = env.ABALONE_AI_DEPTH;
  if (env.ABALONE_LAYOUT) update.boardLayout = env.ABALONE_LAYOUT;
  return mergeConfig(DEFAULT_GAME_CONFIG, update);
}

async function main() {
  console.error('🎮 Starting Abalone MCP Server...');

  const config = configFromEnv(process.env);
  if (!config.ok) {
    console.error(`❌ Invalid game settings: ${config.reason}`);
    process.exit(1);
  }

  // Logs from the session go to stderr too
  console.log = console.error;

  const session = new GameSession(config.config);
  const server = createMCPServer(session);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error(`🚀 Abalone MCP Server ready (mode: ${config.config.mode}, depth: ${config.config.aiDepth})`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
