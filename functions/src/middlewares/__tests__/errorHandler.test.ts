import { z } from 'zod';
import {
  asExpressRequest,
  asExpressResponse,
  createRequest,
  TestResponse,
} from '../../__tests__/helpers/http';
import { NotFoundError } from '../../utils/apiErrors';
import { createErrorHandler, sendApiError } from '../errorHandler';

function bodyParserError(type: string, status: number, message: string) {
  return Object.assign(new Error(message), { type, status });
}

describe('sendApiError', () => {
  it('writes the envelope for api errors', () => {
    const res = new TestResponse();

    expect(sendApiError(asExpressResponse(res), new NotFoundError('User not found'))).toBe(true);
    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ code: 'not_found', message: 'User not found' });
  });

  it('maps zod failures to 422 with issue details', () => {
    const res = new TestResponse();
    const result = z.object({ client_name: z.string() }).safeParse({});
    if (result.success) {
      throw new Error('expected parse failure');
    }

    expect(sendApiError(asExpressResponse(res), result.error)).toBe(true);
    expect(res.statusCode).toBe(422);
    expect(res.body).toMatchObject({
      code: 'validation_failed',
      message: 'Invalid request body',
      details: [expect.objectContaining({ path: ['client_name'] })],
    });
  });

  it('leaves unknown errors to the caller', () => {
    const res = new TestResponse();

    expect(sendApiError(asExpressResponse(res), new Error('boom'))).toBe(false);
    expect(res.body).toBeUndefined();
  });
});

describe('errorHandler', () => {
  const req = createRequest({ method: 'POST', path: '/api/status' });

  it('answers 422 for bodies that are not valid JSON', () => {
    const handler = createErrorHandler({ exposeErrors: false });
    const res = new TestResponse();

    handler(
      bodyParserError('entity.parse.failed', 400, 'Unexpected token'),
      asExpressRequest(req),
      asExpressResponse(res),
      jest.fn(),
    );

    expect(res.statusCode).toBe(422);
    expect(res.body).toEqual({
      code: 'validation_failed',
      message: 'Request body is not valid JSON',
    });
  });

  it('keeps the status of other body parser failures', () => {
    const handler = createErrorHandler({ exposeErrors: false });
    const res = new TestResponse();

    handler(
      bodyParserError('entity.too.large', 413, 'request entity too large'),
      asExpressRequest(req),
      asExpressResponse(res),
      jest.fn(),
    );

    expect(res.statusCode).toBe(413);
    expect(res.body).toEqual({ code: 'invalid_body', message: 'request entity too large' });
  });

  it('hides unexpected error details in production', () => {
    const handler = createErrorHandler({ exposeErrors: false });
    const res = new TestResponse();

    handler(new Error('database exploded'), asExpressRequest(req), asExpressResponse(res), jest.fn());

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ code: 'server_error', message: 'An unexpected error occurred' });
  });

  it('exposes the message outside production', () => {
    const handler = createErrorHandler({ exposeErrors: true });
    const res = new TestResponse();

    handler(new Error('database exploded'), asExpressRequest(req), asExpressResponse(res), jest.fn());

    expect(res.statusCode).toBe(500);
    expect(res.body).toMatchObject({ code: 'server_error', message: 'database exploded' });
  });

  it('delegates once headers are sent', () => {
    const handler = createErrorHandler({ exposeErrors: true });
    const res = new TestResponse();
    res.headersSent = true;
    const next = jest.fn();
    const error = new Error('late failure');

    handler(error, asExpressRequest(req), asExpressResponse(res), next);

    expect(next).toHaveBeenCalledWith(error);
    expect(res.body).toBeUndefined();
  });
});
