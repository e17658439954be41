import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AppConfig } from './core/config/env';
import { errorHandler } from './core/errors/errorHandler';
import type { EventsRepository } from './modules/events/events.repository';
import { createEventsService } from './modules/events/events.service';
import { createEventsRouter } from './modules/events/events.routes';
import { createPagesRouter } from './modules/pages/pages.routes';

export interface AppDeps {
  config: AppConfig;
  events: EventsRepository;
}

export function createApp({ config, events }: AppDeps) {
  const app = express();
  const eventsService = createEventsService({ repo: events, config });

  // Middlewares globales
  // CORS abierto: el editor puede vivir en otro origen
  app.use(
    cors({
      origin: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization']
    })
  );

  // Las páginas enlazan imágenes externas (https) desde el markdown;
  // el editor (otro origen) embebe los QR con <img>
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          'img-src': ["'self'", 'data:', 'https:']
        }
      },
      crossOriginResourcePolicy: { policy: 'cross-origin' }
    })
  );
  // 50k chars escapados como \uXXXX son ~300kB
  app.use(express.json({ limit: '512kb' }));

  if (config.nodeEnv !== 'test') {
    app.use(morgan('dev'));
  }

  // Healthcheck
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Editor (API JSON)
  app.use('/api/events', createEventsRouter(eventsService, config.jwtSecret));

  // Visitantes: página + QR
  app.use('/e', createPagesRouter(eventsService));

  // 404
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Errores
  app.use(errorHandler);

  return app;
}
