/**
 * HTTP and WebSocket server wiring for the tracking backend
 */

import express, { Express } from 'express';
import http from 'http';
import { TrackingServiceConfig } from './types/tracking';
import { createTrackingCore, TrackingCore, TrackingCoreOverrides } from './services/tracking';
import { SubscriptionGateway } from './services/tracking/SubscriptionGateway';
import { TrackingController } from './controllers/tracking';
import { createTrackingRouter } from './routes/tracking';
import { authenticate } from './middleware/authenticate';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';

export interface TrackingServer {
  app: Express;
  httpServer: http.Server;
  core: TrackingCore;
  gateway: SubscriptionGateway;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createApp(core: TrackingCore): Express {
  const app = express();
  const controller = new TrackingController(core.ingest, core.registry);

  app.disable('x-powered-by');
  app.use(express.json({ limit: '100kb' }));
  app.use(authenticate(core.identities));
  app.use('/api/tracking', createTrackingRouter(controller));
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export function createTrackingServer(
  config: TrackingServiceConfig,
  overrides: TrackingCoreOverrides = {}
): TrackingServer {
  const core = createTrackingCore(config, overrides);
  const app = createApp(core);
  const httpServer = http.createServer(app);
  const gateway = new SubscriptionGateway(core.ingest, core.registry, core.identities, {
    path: config.realtime.path,
    allowedOrigins: config.realtime.allowedOrigins,
  });
  gateway.attach(httpServer);

  const start = (): Promise<void> =>
    new Promise((resolve, reject) => {
      httpServer.once('error', reject);
      httpServer.listen(config.server.port, config.server.host, () => {
        httpServer.off('error', reject);
        console.log(`Tracking server listening on http://${config.server.host}:${config.server.port}`);
        resolve();
      });
    });

  const stop = async (): Promise<void> => {
    console.log('Shutting down tracking server...');
    await gateway.close();
    await new Promise<void>((resolve, reject) => {
      httpServer.close(error => (error ? reject(error) : resolve()));
    });
    await core.ingest.shutdown();
    await core.storage.close();
    console.log('Tracking server stopped');
  };

  return { app, httpServer, core, gateway, start, stop };
}
