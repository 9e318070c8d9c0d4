import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import fs from 'fs';
import path from 'path';
import swaggerUi from 'swagger-ui-express';
import { appConfig } from './config/appConfig';
import { createPlanRouter } from './routes/planRoutes';
import { errorHandler } from './middleware/errorHandler';
import {
  planRegistryService,
  PlanRegistryService,
} from './services/registry/planRegistry.service';

// Written by `npm run tsoa:spec`
const SWAGGER_SPEC_PATH = path.join(__dirname, 'generated', 'swagger.json');

export function createApp(registry: PlanRegistryService = planRegistryService): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  // Health check route
  app.get('/health', (_req, res) => {
    res.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      plans: registry.getStats(),
    });
  });

  // Swagger UI - serve TSOA-generated documentation
  if (appConfig.docsEnabled) {
    if (fs.existsSync(SWAGGER_SPEC_PATH)) {
      const swaggerDocument = JSON.parse(fs.readFileSync(SWAGGER_SPEC_PATH, 'utf8'));
      app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));
    } else {
      console.warn('⚠️  Swagger documentation not found. Run: npm run tsoa:spec');
    }
  }

  app.use(createPlanRouter(registry));

  // Error handling middleware
  app.use(errorHandler);

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Route not found' });
  });

  return app;
}
