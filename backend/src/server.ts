// Server entry point for the content generation service

// Load environment variables FIRST before any other imports
import dotenv from 'dotenv';
import path from 'path';

// Explicitly point to .env file location
dotenv.config({ path: path.resolve(__dirname, '../.env') });

import { createApp } from './app';
import { getSettings } from './config/settings';

/**
 * Start the Express server
 * - Text service v1.2 for slide content
 * - Deck builder for publishing (when DECK_BUILDER_ENABLED=true)
 */
const startServer = async (): Promise<void> => {
  try {
    const settings = getSettings();

    // Create Express app
    const app = createApp(settings);

    app.listen(settings.PORT, () => {
      console.log(`🚀 Content generation API running on port ${settings.PORT}`);
      console.log(`🌍 Environment: ${settings.NODE_ENV}`);
      console.log(`🔗 Text service: ${settings.TEXT_SERVICE_URL}`);
      console.log(
        settings.DECK_BUILDER_ENABLED
          ? `📋 Deck builder: ${settings.DECK_BUILDER_API_URL}`
          : '📋 Deck builder integration disabled'
      );
    });
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
};

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  console.error('❌ Uncaught Exception:', error);
  process.exit(1);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason, promise) => {
  console.error('❌ Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

// Start the server
void startServer();
