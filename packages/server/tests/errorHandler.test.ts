import express from 'express';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { errorHandler } from '../src/routes/errorHandler.js';

describe('errorHandler', () => {
  let app: express.Express;
  let failure: unknown;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    failure = new Error('unset');
    app = express();
    app.get('/fail', (_req, _res, next) => {
      next(failure);
    });
    app.use(errorHandler);
  });

  // Helper to make requests
  async function request(path: string) {
    const server = app.listen(0);
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 3000;

    try {
      const response = await fetch(`http://localhost:${port}${path}`);
      const data = await response.json().catch(() => ({}));
      return { status: response.status, data };
    } finally {
      server.close();
    }
  }

  it('should answer a client error with its own status', async () => {
    failure = Object.assign(new Error('request entity too large'), {
      status: 413,
      type: 'entity.too.large',
    });

    const { status, data } = await request('/fail');

    expect(status).toBe(413);
    expect(data).toEqual({ error: 'request entity too large' });
  });

  it('should read statusCode as well', async () => {
    failure = Object.assign(new Error('unsupported charset "LATIN-9"'), { statusCode: 415 });

    const { status, data } = await request('/fail');

    expect(status).toBe(415);
    expect(data).toEqual({ error: 'unsupported charset "LATIN-9"' });
  });

  it('should hide server errors behind a 500', async () => {
    failure = Object.assign(new Error('socket hang up'), { status: 503 });

    const { status, data } = await request('/fail');

    expect(status).toBe(500);
    expect(data).toEqual({ error: 'Internal server error' });
  });

  it('should answer malformed JSON with 400', async () => {
    failure = new SyntaxError('Unexpected end of JSON input');

    const { status, data } = await request('/fail');

    expect(status).toBe(400);
    expect(data).toEqual({ error: 'Invalid JSON format' });
  });
});
