import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import trackerRoutes, { createIngestHandler, formFields } from './api/routes';
import type { TrackerService } from './services/tracker';

export interface AppDeps {
  service: TrackerService;
}

export function createApp({ service }: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(compression());
  app.use(cors());
  app.use(express.json());
  // Devices post the probe as a plain HTML form
  app.use(express.urlencoded({ extended: false }));

  // Device callback URL
  app.post('/new-probe', formFields, createIngestHandler(service));

  // API Routes
  app.use('/api', trackerRoutes(service));

  // Root endpoint
  app.get('/', (req, res) => {
    res.json({
      name: 'Bike Tracker API',
      version: '1.0.0',
      endpoints: {
        newProbe: '/new-probe',
        probes: '/api/probes',
        activities: '/api/activities',
        activity: '/api/activities/:id',
        merge: '/api/activities/:id/merge-into/:targetId',
        gpx: '/api/activities/:id/gpx',
        upload: '/api/activities/:id/upload',
        capabilities: '/api/capabilities',
        health: '/api/health',
      },
    });
  });

  return app;
}
