#!/usr/bin/env node

/**
 * Article Humanizer - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { McpServer } from './presentation/McpServer.js';

async function main() {
  let server: McpServer | null = null;

  // Missing or invalid settings halt the process before anything is served
  const config = getConfig();
  printConfigInfo(config);

  try {
    server = new McpServer(config);
    await server.start();

    if (!config.webUI.enabled && config.mcp.transport === 'disabled') {
      console.error('⚠️ Both the web UI and the MCP transport are disabled; nothing to serve.');
    }

    // Setup graceful shutdown
    const shutdown = async (signal: string) => {
      console.error(`\n\n📛 Received ${signal}, shutting down gracefully...`);
      if (server) {
        await server.shutdown();
      }
      console.error('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => {
      shutdown('SIGINT').catch((error) => {
        console.error('💥 Error during shutdown:', error);
        process.exit(1);
      });
    });
    process.on('SIGTERM', () => {
      shutdown('SIGTERM').catch((error) => {
        console.error('💥 Error during shutdown:', error);
        process.exit(1);
      });
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection:', reason);
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    if (server) {
      await server.shutdown();
    }

    process.exit(1);
  }
}

// Start the server
main().catch((error) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
