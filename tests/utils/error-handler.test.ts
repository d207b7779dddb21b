import {
  ErrorHandler,
  InjectedFailureError,
  NotFoundError,
  NwsUpstreamError,
  ValidationError,
  WeatherHubError,
  WeatherHubErrorType,
  createProblemDetails,
  statusCodeFor,
  toError
} from '../../src/utils/error-handler';
import { LogLevel } from '../../src/utils/logger';
import { capturingLogger } from '../support';

describe('WeatherHubError', () => {
  it('should carry its type, operation and details', () => {
    const error = new WeatherHubError('bad cache', WeatherHubErrorType.CACHE_ERROR, 'get', { key: 'zones' });

    expect(error.context.errorType).toBe(WeatherHubErrorType.CACHE_ERROR);
    expect(error.context.operation).toBe('get');
    expect(error.context.details).toEqual({ key: 'zones' });
    expect(error.toString()).toBe('[cache_error] bad cache (Operation: get)');
  });

  it('should keep the upstream status on NwsUpstreamError', () => {
    const error = new NwsUpstreamError('down', 503, 'getZoneForecast', { zoneId: 'WAZ558' });

    expect(error.status).toBe(503);
    expect(error.context.details).toEqual({ zoneId: 'WAZ558', status: 503 });
    expect(error.name).toBe('NwsUpstreamError');
  });
});

describe('statusCodeFor', () => {
  it('should map error types to HTTP statuses', () => {
    expect(statusCodeFor(new ValidationError('x'))).toBe(400);
    expect(statusCodeFor(new NwsUpstreamError('x', 500))).toBe(404);
    expect(statusCodeFor(new NotFoundError('x'))).toBe(404);
    expect(statusCodeFor(new InjectedFailureError('x'))).toBe(500);
    expect(statusCodeFor(new Error('x'))).toBe(500);
  });
});

describe('createProblemDetails', () => {
  it('should use the RFC 9110 section for known statuses', () => {
    expect(createProblemDetails(400, 'Invalid zone id: x', '/forecast/x')).toEqual({
      type: 'https://tools.ietf.org/html/rfc9110#section-15.5.1',
      title: 'Bad Request',
      status: 400,
      detail: 'Invalid zone id: x',
      instance: '/forecast/x'
    });
  });

  it('should fall back to the server error description', () => {
    const problem = createProblemDetails(502);

    expect(problem.status).toBe(502);
    expect(problem.title).toBe('An error occurred while processing your request.');
  });
});

describe('toError', () => {
  it('should wrap non-error values', () => {
    const original = new Error('kept');

    expect(toError(original)).toBe(original);
    expect(toError('text').message).toBe('text');
  });
});

describe('ErrorHandler', () => {
  it('should log validation errors as warnings and failures as errors', () => {
    const { logger, entries } = capturingLogger();
    const handler = new ErrorHandler(logger);

    handler.handleError(new ValidationError('Invalid zone id: x', 'normalizeZoneId'));
    handler.handleError(new InjectedFailureError('Simulated failure on forecast request 5'));
    handler.handleError(new WeatherHubError('no config', WeatherHubErrorType.CONFIGURATION_ERROR));

    expect(entries.map(entry => entry.level)).toEqual([LogLevel.WARN, LogLevel.ERROR, LogLevel.FATAL]);
    expect(entries[0].operation).toBe('normalizeZoneId');
    expect(entries[1].message).toBe('Injected failure: Simulated failure on forecast request 5');
  });

  it('should merge context into the returned error context', () => {
    const { logger } = capturingLogger();
    const handler = new ErrorHandler(logger);

    const context = handler.handleError(
      new NwsUpstreamError('down', 503, undefined, { zoneId: 'WAZ558' }),
      { operation: 'GET /forecast/:zoneId', details: { attempt: 1 } }
    );

    expect(context.errorType).toBe(WeatherHubErrorType.UPSTREAM_ERROR);
    expect(context.operation).toBe('GET /forecast/:zoneId');
    expect(context.details).toEqual({ zoneId: 'WAZ558', status: 503, attempt: 1 });
  });

  it('should hide internal messages in server error problem details', () => {
    const handler = new ErrorHandler(capturingLogger().logger);

    expect(handler.toProblemDetails(new Error('database password wrong'), '/zones').detail).toBeUndefined();
    expect(handler.toProblemDetails(new ValidationError('Invalid zone id: x'), '/forecast/x')).toMatchObject({
      status: 400,
      detail: 'Invalid zone id: x',
      instance: '/forecast/x'
    });
  });

  it('should log and rethrow from wrapped operations', async () => {
    const { logger, entries } = capturingLogger();
    const handler = new ErrorHandler(logger);
    const wrapped = handler.wrapOperation(async () => {
      throw new Error('failed');
    }, 'refresh');

    await expect(wrapped()).rejects.toThrow('failed');
    expect(entries).toHaveLength(1);
    expect(entries[0].operation).toBe('refresh');
  });

  it('should return the result of wrapped operations', async () => {
    const handler = new ErrorHandler(capturingLogger().logger);

    await expect(handler.wrapOperation(async () => 42)()).resolves.toBe(42);
  });
});
