import { trackingConfig } from './config/tracking';
import { createTrackingServer } from './server';

async function main(): Promise<void> {
  trackingConfig.validateConfig();
  const server = createTrackingServer(trackingConfig.getConfig());

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}`);
    server.stop()
      .then(() => process.exit(0))
      .catch(error => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
  console.log('🚀 Tracking backend ready');
}

main().catch(error => {
  console.error('❌ Failed to start tracking backend:', error);
  process.exit(1);
});
