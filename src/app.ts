import { randomUUID } from 'crypto';
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import swaggerUi from 'swagger-ui-express';
import { API_VERSION, APP_VERSION, RateLimitConfig, ErrorMessages } from './config/constants.js';
import { logger } from './config/logger.js';
import { swaggerSpec } from './config/swagger.js';

// Import route modules
import { menuRoutes } from './modules/menu/index.js';
import { orderRoutes } from './modules/orders/index.js';

import { globalErrorHandler, notFoundHandler } from './shared/middleware/error.middleware.js';

// Create Express app
const app: Express = express();

// Trust proxy (for rate limiting behind reverse proxy)
app.set('trust proxy', 1);

app.use(cors());

// Security middleware
app.use(
  helmet({
    crossOriginResourcePolicy: { policy: 'cross-origin' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    xFrameOptions: { action: 'deny' },
  })
);

// Body parsing middleware
app.use(express.json({ limit: '1mb' }));

// Request id, echoed back so a response can be matched to its log lines
app.use((req: Request, res: Response, next: NextFunction) => {
  const incoming = req.get('x-request-id');
  req.requestId = incoming && incoming.length <= 100 ? incoming : randomUUID();
  res.setHeader('X-Request-Id', req.requestId);
  next();
});

// General rate limiting, keyed by IP
const generalLimiter = rateLimit({
  windowMs: RateLimitConfig.GENERAL.windowMs,
  max: RateLimitConfig.GENERAL.maxRequests,
  message: {
    success: false,
    error: {
      code: 'RATE_LIMIT_EXCEEDED',
      message: ErrorMessages.RATE_LIMIT_EXCEEDED,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  skip: (req: Request) => req.path === '/health',
});

app.use(generalLimiter);

// Request logging middleware
app.use((req: Request, _res: Response, next: NextFunction) => {
  logger.http(`${req.method} ${req.path}`, {
    requestId: req.requestId,
    ip: req.ip,
    userAgent: req.get('user-agent'),
  });
  next();
});

// Root endpoint
app.get('/', (_req: Request, res: Response) => {
  res.json({
    success: true,
    message: 'Restaurant Order Service',
    version: APP_VERSION,
    endpoints: {
      health: '/health',
      version: '/version',
      api: API_VERSION,
      swagger: '/swagger',
      swaggerJson: '/swagger.json',
    },
  });
});

// Health check endpoint
app.get('/health', (_req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: process.env['NODE_ENV'] ?? 'development',
    memory: {
      used: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
      total: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
      unit: 'MB',
    },
  });
});

// Version endpoint
app.get('/version', (_req: Request, res: Response) => {
  res.json({
    success: true,
    version: APP_VERSION,
    status: 'operational',
  });
});

// Swagger API Documentation
app.use('/swagger', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
  customCss: '.swagger-ui .topbar { display: none }',
  customSiteTitle: 'Restaurant Order Service API Docs',
}));

// Serve swagger spec as JSON
app.get('/swagger.json', (_req: Request, res: Response) => {
  res.json(swaggerSpec);
});

// API root endpoint
app.get(API_VERSION, (_req: Request, res: Response) => {
  res.json({
    success: true,
    message: 'Restaurant Order Service API',
    version: APP_VERSION,
    documentation: '/swagger',
  });
});

// Register route modules
app.use(`${API_VERSION}/menu`, menuRoutes);
app.use(`${API_VERSION}/orders`, orderRoutes);

// 404 handler
app.use(notFoundHandler);

// Global error handler
app.use(globalErrorHandler);

export default app;
