import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { StatusCodes } from 'http-status-codes';
import config from './config/config';
import catalogService from './services/catalog.service';
import recommendationRoutes from './routes/recommendation.routes';
import catalogRoutes from './routes/catalog.routes';
import logger from './utils/logger';

// Initialize Express app
const app = express();

// Middleware
app.use(
  cors({
    origin: config.CORS_ORIGINS.length > 0 ? config.CORS_ORIGINS : true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  })
);
app.use(express.json());

app.get('/', (req: Request, res: Response) => {
  res.json({
    success: true,
    message: 'Coffee recommendation API is running',
    env: config.NODE_ENV,
    version: '1.0.0',
  });
});

// Health check endpoint
app.get('/health', (req: Request, res: Response) => {
  const catalog = catalogService.getStats();
  res.json({
    success: true,
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    env: config.NODE_ENV,
    catalog: {
      loaded: catalog.loaded,
      totalCoffees: catalog.totalCoffees,
      loadedAt: catalog.loadedAt,
    },
  });
});

// Mount routers
app.use('/api/recommendations', recommendationRoutes);
app.use('/api/catalog', catalogRoutes);

app.use((req: Request, res: Response) => {
  res.status(StatusCodes.NOT_FOUND).json({
    success: false,
    error: `Route not found: ${req.method} ${req.originalUrl}`,
  });
});

// Error handling middleware
app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
  logger.error('Unhandled request error', err);
  const status =
    err instanceof SyntaxError ? StatusCodes.BAD_REQUEST : StatusCodes.INTERNAL_SERVER_ERROR;
  res.status(status).json({
    success: false,
    error: err instanceof SyntaxError ? 'Malformed JSON body' : 'An unknown error occurred',
  });
});

export default app;
