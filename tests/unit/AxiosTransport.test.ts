// tests/unit/AxiosTransport.test.ts

import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';
import { AxiosTransport } from '../../src/core/http/AxiosTransport';
import { NetworkTimeoutError, TransportError } from '../../src/utils/errors';
import type { ApiRequest } from '../../src/core/http/types';

const ORIGIN = 'https://api.example.com';

describe('AxiosTransport', () => {
  const transport = new AxiosTransport();

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('should send method, headers and body unchanged', async () => {
    let receivedBody: unknown;
    nock(ORIGIN)
      .post('/v1/servers')
      .matchHeader('X-API-Key', 'test-key')
      .matchHeader('Accept', 'application/json')
      .reply(201, (_uri, body) => {
        receivedBody = body;
        return { id: 'srv_1' };
      });

    const request: ApiRequest = {
      method: 'POST',
      url: `${ORIGIN}/v1/servers`,
      headers: { Accept: 'application/json', 'X-API-Key': 'test-key' },
      body: Buffer.from('{"name": "test-server"}'),
    };
    const response = await transport.send(request, { timeout: 1000 });

    expect(response.status).toBe(201);
    expect(receivedBody).toBe('{"name": "test-server"}');
    expect((await response.readBody()).toString()).toBe('{"id":"srv_1"}');
  });

  it('should resolve error statuses instead of rejecting', async () => {
    nock(ORIGIN).get('/v1/missing').reply(404, { message: 'Not found' });

    const response = await transport.send(
      { method: 'GET', url: `${ORIGIN}/v1/missing`, headers: {} },
      { timeout: 1000 }
    );

    expect(response.status).toBe(404);
    expect((await response.readBody()).toString()).toBe('{"message":"Not found"}');
  });

  it('should map connection failures to TransportError', async () => {
    nock(ORIGIN)
      .get('/v1/servers')
      .replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });

    const sending = transport.send(
      { method: 'GET', url: `${ORIGIN}/v1/servers`, headers: {} },
      { timeout: 1000 }
    );

    await expect(sending).rejects.toBeInstanceOf(TransportError);
    await expect(sending).rejects.toMatchObject({
      code: 'TRANSPORT_ERROR',
      details: expect.objectContaining({ code: 'ECONNREFUSED', method: 'GET' }),
    });
  });

  it('should map timeouts to NetworkTimeoutError', async () => {
    nock(ORIGIN).get('/v1/slow').delay(500).reply(200, {});

    const sending = transport.send(
      { method: 'GET', url: `${ORIGIN}/v1/slow`, headers: {} },
      { timeout: 50 }
    );

    await expect(sending).rejects.toBeInstanceOf(NetworkTimeoutError);
    await expect(sending).rejects.toMatchObject({ code: 'NETWORK_TIMEOUT' });
  });
});
