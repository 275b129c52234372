import { createServer } from 'http';
import app from './app';
import config from './config/config';
import catalogService from './services/catalog.service';
import { CoffeeCatalog } from './models/coffee.model';
import logger from './utils/logger';

// Create HTTP server
const httpServer = createServer(app);

catalogService.on('reloaded', (catalog: CoffeeCatalog) => {
  logger.info(`📦 Catalog snapshot active with ${catalog.length} coffees`);
});

// Start the server
const startServer = async () => {
  // The catalog also loads on first demand, so a failure here is not fatal
  try {
    await catalogService.getCatalog();
  } catch (error) {
    logger.warn('⚠️ Catalog could not be loaded at startup; requests will retry', error);
  }

  httpServer.listen(config.PORT, '0.0.0.0', () => {
    logger.info(`🚀 Server running in ${config.NODE_ENV} mode`);
    logger.info(`📡 Listening on 0.0.0.0:${config.PORT}`);
    logger.info(`🔗 Health check: http://localhost:${config.PORT}/health`);
  });
};

const shutdown = (signal: string) => {
  logger.info(`${signal} received, closing server`);
  httpServer.close(() => process.exit(0));
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

startServer().catch((err) => {
  logger.error('❌ Critical server startup error:', err);
  process.exit(1);
});
