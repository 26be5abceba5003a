//  src/app.ts
import express, { Express } from 'express';
import cors from 'cors';
import { AppServices } from './services/container';
import { errorHandler, notFound } from './middlewares/error.middleware';

// Import all your route files
import { createHealthRoutes } from './routes/health.routes';
import { createAuthRoutes } from './routes/auth.routes';
import { createProfileRoutes } from './routes/profile.routes';
import { createChatRoutes } from './routes/chat.routes';
import { createAdminRoutes } from './routes/admin.routes';
import { createCheckoutRoutes } from './routes/checkout.routes';

export const createApp = (services: AppServices): Express => {
  const { config } = services;
  const app = express();

  if (config.isProduction) {
    app.set('trust proxy', 1);
  }

  const corsOptions: cors.CorsOptions = {
    origin: config.allowedOrigins.includes('*') ? '*' : [...config.allowedOrigins],
    allowedHeaders: ['Content-Type', 'Authorization'],
  };
  app.use(cors(corsOptions));

  // ✅ Debug logging middleware (off in production and under test)
  if (!config.isProduction && config.env !== 'test') {
    app.use((req, res, next) => {
      if (req.path.startsWith('/api')) {
        console.log(`📍 ${req.method} ${req.path}`);
      }
      next();
    });
  }

  app.use(express.json({ limit: '100kb' }));

  // --- API ROUTES ---
  app.use('/', createHealthRoutes(services));
  app.use('/api', createAuthRoutes(services));
  app.use('/api', createProfileRoutes(services));
  app.use('/api/chat', createChatRoutes(services));
  app.use('/api/admin', createAdminRoutes(services));
  app.use('/api/checkout', createCheckoutRoutes(services));

  // --- 404 and Error Handlers ---
  app.use('*', notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
