/**
 * Courtside - Main Entry Point
 *
 * Headless league dashboard: polls scores, standings and league leaders
 * through a two-tier cache and logs each snapshot.
 */

import { logger } from './core/logger.js';
import { startApp } from './services/app.js';

// Start the session and handle any uncaught errors
startApp().catch((err) => {
  logger.error({ err }, 'Fatal error occurred');
  process.exit(1);
});
