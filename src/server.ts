import { createServer } from 'http';
import { config } from './config';
import { logger } from './utils/logger';
import { createApp } from './app';
import { seedInitialData } from './utils/seedData';

const PORT = config.server.port;
const HOST = config.server.host;
const httpServer = createServer(createApp());

// Start server
httpServer.listen(PORT, HOST, () => {
  logger.info(`🚀 Auction server started on port ${PORT}`);
  logger.info(`📊 Environment: ${config.server.nodeEnv}`);
  logger.info(`🏥 Health check: http://localhost:${PORT}/health`);
  logger.info(`📚 API Docs: http://localhost:${PORT}/api-docs`);

  if (config.server.nodeEnv === 'development') {
    seedInitialData().catch((error: unknown) => {
      logger.error('Failed to seed initial data:', error);
    });
  }
});

// Graceful shutdown
const shutdown = (signal: string): void => {
  logger.info(`${signal} received, shutting down gracefully`);
  httpServer.close(() => process.exit(0));
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
