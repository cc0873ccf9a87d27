import express, { type Express } from 'express';
import { createServer, type Server } from 'http';
import {
  createTrafficRouter,
  type TrafficRouteOptions,
  type TrafficRouteSource,
} from './traffic-routes';

export function createApp(source: TrafficRouteSource, options: TrafficRouteOptions): Express {
  const app = express();

  // Disable caching for all API routes to ensure fresh data
  app.use('/api', (_req, res, next) => {
    res.set({
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      Pragma: 'no-cache',
      Expires: '0',
    });
    next();
  });

  // Mount traffic routes for the live report
  app.use('/api/traffic', createTrafficRouter(source, options));

  return app;
}

export function registerRoutes(source: TrafficRouteSource, options: TrafficRouteOptions): Server {
  return createServer(createApp(source, options));
}
