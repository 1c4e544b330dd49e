/**
 * Prometheus Metrics
 *
 * Metrics for monitoring extraction outcomes, map image handling and HTTP traffic.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Extraction Metrics
// ============================================================================

export const reportsProcessedCounter = new promClient.Counter({
  name: 'drone_reports_processed_total',
  help: 'Total number of PDF reports run through the extractor',
  labelNames: ['analysis_type', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'drone_extraction_duration_seconds',
  help: 'Duration of a single report extraction',
  labelNames: ['analysis_type', 'status'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [register],
});

export const mapImageCounter = new promClient.Counter({
  name: 'drone_map_images_total',
  help: 'Map image results by source (embedded, page_render, cloud_upload, error)',
  labelNames: ['source'],
  registers: [register],
});

export const uploadDurationHistogram = new promClient.Histogram({
  name: 'drone_asset_upload_duration_seconds',
  help: 'Duration of map image uploads to the asset host',
  labelNames: ['status'],
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

// ============================================================================
// HTTP Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'drone_http_request_duration_seconds',
  help: 'HTTP request duration',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'drone_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for metrics endpoint
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
