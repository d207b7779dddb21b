/**
 * Service defaults
 *
 * Wiring every hub service shares: HTTP telemetry, request logging, the
 * health and metrics endpoints and problem details error responses.
 */

import express, {
  Application,
  ErrorRequestHandler,
  NextFunction,
  Request,
  RequestHandler,
  Response
} from 'express';
import { SpanKind, SpanStatusCode } from '@opentelemetry/api';
import { HealthConfig } from '../config';
import { Logger } from '../utils/logger';
import { ErrorHandler, createProblemDetails, toError } from '../utils/error-handler';
import { HealthCheckRegistry } from './health';
import { Telemetry } from './telemetry';

export * from './health';
export * from './telemetry';

export interface ServiceDefaultsOptions {
  telemetry: Telemetry;
  health: HealthConfig;
  healthChecks: HealthCheckRegistry;
  logger: Logger;
}

/**
 * Let async route handlers hand their failures to the error middleware
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

function routeOf(req: Request): string {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : req.path;
}

/**
 * A server span and an `http.server.request.duration` sample per request
 */
export function httpInstrumentation(telemetry: Telemetry): RequestHandler {
  const tracer = telemetry.getTracer('weather-hub.http');
  const duration = telemetry.getMeter('weather-hub.http').createHistogram('http.server.request.duration', {
    unit: 's',
    description: 'Duration of inbound HTTP requests'
  });

  return (req, res, next) => {
    const started = process.hrtime.bigint();

    tracer.startActiveSpan(req.method, {
      kind: SpanKind.SERVER,
      attributes: {
        'http.request.method': req.method,
        'url.path': req.path
      }
    }, (span) => {
      let ended = false;

      // 'close' without 'finish' means the client went away first
      const complete = (aborted: boolean) => {
        if (ended) {
          return;
        }
        ended = true;

        const route = routeOf(req);
        span.updateName(`${req.method} ${route}`);
        span.setAttribute('http.route', route);
        span.setAttribute('http.response.status_code', res.statusCode);
        if (aborted) {
          span.setAttribute('http.request.aborted', true);
          span.setStatus({ code: SpanStatusCode.ERROR, message: 'Client closed the connection' });
        } else if (res.statusCode >= 500) {
          span.setStatus({ code: SpanStatusCode.ERROR });
        }
        span.end();

        duration.record(Number(process.hrtime.bigint() - started) / 1e9, {
          'http.request.method': req.method,
          'http.route': route,
          'http.response.status_code': res.statusCode
        });
      };

      res.on('finish', () => complete(false));
      res.on('close', () => complete(!res.writableFinished));

      next();
    });
  };
}

export function requestLogging(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const started = Date.now();
    res.on('finish', () => {
      logger.info(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
        durationMs: Date.now() - started
      }, 'request');
    });
    next();
  };
}

/**
 * Middleware every service installs before its own routes
 */
export function addServiceDefaults(app: Application, options: ServiceDefaultsOptions): void {
  app.disable('x-powered-by');
  app.use(httpInstrumentation(options.telemetry));
  app.use(requestLogging(options.logger));
  app.use(express.json());
}

/**
 * `/health` and `/alive` when health endpoints are enabled, `/metrics` when
 * the Prometheus exporter is
 */
export function mapDefaultEndpoints(app: Application, options: ServiceDefaultsOptions): void {
  if (options.health.enabled) {
    app.get('/health', asyncHandler(async (req, res) => {
      const report = await options.healthChecks.run();
      res.status(report.status === 'Healthy' ? 200 : 503).json(report);
    }));

    // Liveness only needs the process to answer
    app.get('/alive', (req, res) => {
      res.type('text/plain').send('Healthy');
    });
  }

  const metricsHandler = options.telemetry.metricsHandler;
  if (metricsHandler) {
    app.get('/metrics', (req, res) => metricsHandler(req, res));
  }
}

export function problemDetailsNotFound(): RequestHandler {
  return (req, res) => {
    res
      .status(404)
      .type('application/problem+json')
      .json(createProblemDetails(404, `No resource at ${req.path}`, req.originalUrl));
  };
}

export function problemDetailsErrorHandler(errorHandler: ErrorHandler): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    const error = toError(err);
    errorHandler.handleError(error, { operation: `${req.method} ${routeOf(req)}` });

    if (res.headersSent) {
      next(error);
      return;
    }

    const problem = errorHandler.toProblemDetails(error, req.originalUrl);
    res.status(problem.status).type('application/problem+json').json(problem);
  };
}
