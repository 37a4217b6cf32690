import express, { Express } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { requireApiToken } from './middleware/auth';
import { createPlantRoutes } from './routes/plants';
import { PlantRegistry } from './plants/registry';
import { OpenWeatherMapClient } from './clients/openWeatherMap';
import { ConsolePublisher, DecisionPublisher } from './transport/publisher';
import { startScheduler, stopScheduler } from './jobs/scheduler';
import { loadConfig, AppConfig } from './config';

dotenv.config();

export interface ServerDependencies {
  config: AppConfig;
  registry: PlantRegistry;
  publisher: DecisionPublisher;
}

export function createServer(deps: ServerDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check (no auth required)
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes (require authentication)
  app.use(
    '/api/plants',
    requireApiToken(deps.config.apiToken),
    createPlantRoutes(deps.registry, { publisher: deps.publisher })
  );

  return app;
}

export function startServer(): void {
  const config = loadConfig();

  if (!config.weather.apiKey) {
    console.warn('OPENWEATHER_API_KEY not configured, weather context will use fallback values');
  }

  const weatherClient = new OpenWeatherMapClient(config.weather);
  const registry = new PlantRegistry(weatherClient);
  const app = createServer({ config, registry, publisher: new ConsolePublisher() });

  const server = app.listen(config.port, '0.0.0.0', () => {
    console.log(`Server running on port ${config.port}`);
  });

  // Start job scheduler
  startScheduler(registry, {
    idleTtlMinutes: config.plantIdleTtlMinutes,
    timezone: config.schedulerTimezone,
  });

  // Graceful shutdown
  process.on('SIGTERM', () => {
    console.log('SIGTERM received, shutting down gracefully');
    stopScheduler();
    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });
  });
}
