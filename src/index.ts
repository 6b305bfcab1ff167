#!/usr/bin/env node

/**
 * Music Track Generator Backend - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { MusicApp } from './presentation/MusicApp.js';

async function main() {
  let app: MusicApp | null = null;

  try {
    // Load configuration
    const config = getConfig();

    // Print configuration info
    printConfigInfo(config);

    app = new MusicApp(config);
    await app.start();

    console.log('\n🚀 Server is running. Press Ctrl+C to stop.\n');

    let shuttingDown = false;
    const shutdown = async (signal: string, exitCode: number = 0) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      if (app) {
        app.printStats();
        try {
          await app.shutdown();
        } catch (error) {
          console.error('💥 Error during shutdown:', error);
          exitCode = 1;
        }
      }

      console.log('👋 Goodbye!\n');
      process.exit(exitCode);
    };

    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });

    // Also handle uncaught errors
    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason, promise) => {
      console.error('💥 Unhandled Rejection at:', promise, 'reason:', reason);
      void shutdown('UNHANDLED_REJECTION', 1);
    });

  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    // Cleanup on error
    if (app) {
      await app.shutdown();
    }

    process.exit(1);
  }
}

// Start the server
main().catch((error) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
