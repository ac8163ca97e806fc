import { describe, expect, it } from 'vitest';
import { testApp } from './helpers.js';

describe('GET /health', () => {
  it('reports uptime without touching admission', async () => {
    const { app, clock } = await testApp();
    clock.advance(90_500);

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      success: true,
      message: 'Service is healthy',
      data: { status: 'ok', version: '1.0.0', uptimeSeconds: 90 }
    });
    await app.close();
  });
});
