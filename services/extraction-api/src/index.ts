/**
 * Extraction API entry point
 */

import { config, logger } from '@dronescan/shared';
import { createApp } from './app';
import { openPdfDocument } from './lib/pdf';
import { createCloudinaryUploader } from './lib/cloudinary';

const uploader = createCloudinaryUploader(config.cloudinary);
if (!uploader) {
  logger.warn('Cloudinary credentials not configured, map images will not be uploaded');
}

const app = createApp({ config, openDocument: openPdfDocument, uploader });

// Start server
const server = app.listen(config.apiPort, config.apiHost, () => {
  logger.info('Extraction API started', {
    host: config.apiHost,
    port: config.apiPort,
    uploads_enabled: uploader !== null,
  });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close((error) => {
    if (error) {
      logger.error('Error while closing HTTP server', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
