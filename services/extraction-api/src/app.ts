/**
 * Extraction API
 *
 * HTTP surface of the drone report extractor. Built by createApp so tests can
 * run it in process with fake documents and uploaders.
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from 'express';
import cors from 'cors';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  runWithContextAsync,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  parseExtractRequest,
  runExtraction,
  stripImageData,
  type AssetUploader,
  type Config,
  type DocumentOpener,
  type ErrorEnvelope,
  type ExtractResponse,
  type HealthResponse,
} from '@dronescan/shared';
import { resolveExtractInput } from './lib/request';

export const SERVICE_NAME = 'drone-pdf-extractor';
export const SERVICE_VERSION = '1.0.0';

export interface AppDependencies {
  config: Config;
  openDocument: DocumentOpener;
  /** Map images are uploaded only when an uploader is given */
  uploader?: AssetUploader | null;
}

function correlationIdOf(res: Response): string {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : getCorrelationId();
}

function errorEnvelope(res: Response, code: string, message: string): ErrorEnvelope {
  return { error: { code, message, correlation_id: correlationIdOf(res) } };
}

/**
 * Status of errors raised by body-parser (malformed JSON, oversized body)
 */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const status = error.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Largest JSON body that can carry a maximum-size PDF as base64
 */
function jsonBodyLimit(maxFileSize: number): number {
  return Math.ceil(maxFileSize / 3) * 4 + 64 * 1024;
}

export function createApp(deps: AppDependencies): Express {
  const { config, openDocument } = deps;
  const uploader = deps.uploader ?? null;
  const app = express();

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.header('x-correlation-id') || ulid();
    res.locals.correlationId = correlationId;
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const routePath: unknown = req.route?.path;
      const path = typeof routePath === 'string' ? routePath : req.path;

      httpRequestDurationHistogram.observe(
        { method: req.method, path, status: res.statusCode.toString() },
        duration
      );
      httpRequestsCounter.inc({
        method: req.method,
        path,
        status: res.statusCode.toString(),
      });

      logger.info('Request completed', {
        correlationId: correlationIdOf(res),
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  const wildcard = config.corsOrigins.includes('*');
  app.use(
    cors({
      origin: wildcard ? '*' : config.corsOrigins,
      credentials: !wildcard,
    })
  );

  app.use(express.json({ limit: jsonBodyLimit(config.maxFileSize) }));

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    const body: HealthResponse = {
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
    };
    res.json(body);
  });

  // Metrics endpoint
  app.get('/metrics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.setHeader('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /extract-drone-data
   * Extracts a ReportRecord from a PDF given by path or as base64 content
   */
  app.post('/extract-drone-data', async (req: Request, res: Response, next: NextFunction) => {
    const correlationId = correlationIdOf(res);

    try {
      await runWithContextAsync({ correlationId }, async () => {
        const parsed = parseExtractRequest(req.body);
        if (!parsed.valid) {
          res
            .status(400)
            .json(
              errorEnvelope(
                res,
                'invalid_request',
                `Exactly one of pdfPath or pdfContent is required (${parsed.errors.join('; ')})`
              )
            );
          return;
        }

        logger.info('Received extraction request', {
          input: parsed.value.pdfPath !== undefined ? 'path' : 'content',
          pdf_path: parsed.value.pdfPath,
        });

        const input = await resolveExtractInput(parsed.value, config.maxFileSize);
        if (!input.ok) {
          logger.warn('Extraction request rejected', { reason: input.error });
          const body: ExtractResponse = { success: false, error: input.error };
          res.json(body);
          return;
        }

        const outcome = await runExtraction(input.source, openDocument, {
          mapPageIndex: config.mapPageIndex,
          renderDpi: config.renderDpi,
          uploader,
          includeImageData: false,
        });

        const body: ExtractResponse = outcome.success
          ? { success: true, extractedData: stripImageData(outcome.extractedData) }
          : outcome;
        res.json(body);
      });
    } catch (error) {
      next(error);
    }
  });

  const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const status = clientErrorStatus(error);
    if (status !== null) {
      const message = error instanceof Error ? error.message : 'Invalid request';
      res
        .status(status)
        .json(errorEnvelope(res, status === 413 ? 'payload_too_large' : 'invalid_request', message));
      return;
    }

    logger.error('Unhandled exception', error);
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      detail:
        config.logLevel === 'debug' && error instanceof Error
          ? error.message
          : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}
