import { describe, expect, it } from 'vitest';
import request from 'supertest';
import { createApp } from './app.js';
import { buildTestContext } from './test/http.js';

describe('GET /health', () => {
  it('is served without authentication', async () => {
    const res = await request(createApp(buildTestContext())).get('/health').expect(200);

    expect(res.body).toMatchObject({ status: 'ok', service: 'kpis', checks: {} });
  });

  it('reports degraded when a dependency probe fails', async () => {
    const app = createApp(buildTestContext(), {
      healthChecks: {
        database: async () => undefined,
        redis: async () => {
          throw new Error('ECONNREFUSED');
        },
      },
    });

    const res = await request(app).get('/health').expect(503);

    expect(res.body.status).toBe('degraded');
    expect(res.body.checks).toEqual({ database: 'ok', redis: 'down' });
  });
});
