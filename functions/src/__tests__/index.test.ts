import * as functions from 'firebase-functions';
import { bootstrap } from '../bootstrap';
import { api } from '../index';
import { createRequest, TestResponse } from './helpers/http';

jest.mock('firebase-functions/v2/https', () => ({
  onRequest: (_options: unknown, handler: unknown) => handler,
}));

jest.mock('../bootstrap', () => ({
  bootstrap: jest.fn(),
}));

describe('api function', () => {
  const bootstrapMock = bootstrap as unknown as jest.Mock;
  const handler = api as unknown as (req: unknown, res: TestResponse) => Promise<void>;

  it('answers 500 while start-up fails and retries on the next request', async () => {
    const failure = new Error('discovery unavailable');
    const app = jest.fn();
    bootstrapMock
      .mockRejectedValueOnce(failure)
      .mockResolvedValueOnce({ app, context: {} });

    const failed = new TestResponse();
    await handler(createRequest(), failed);

    expect(failed.statusCode).toBe(500);
    expect(failed.body).toEqual({
      code: 'server_error',
      message: 'Service is starting up, please retry',
    });
    expect(functions.logger.error).toHaveBeenCalledWith('[bootstrap] Failed to start API:', failure);

    const req = createRequest();
    const res = new TestResponse();
    await handler(req, res);

    expect(app).toHaveBeenCalledWith(req, res);

    await handler(createRequest(), new TestResponse());

    expect(bootstrapMock).toHaveBeenCalledTimes(2);
    expect(app).toHaveBeenCalledTimes(2);
  });
});
