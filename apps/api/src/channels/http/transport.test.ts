import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  NETWORK_FAILURE_STATUS,
  TransportNetworkError,
  TransportTimeoutError,
  UndiciHttpTransport,
} from './transport';

describe('UndiciHttpTransport', () => {
  let agent: MockAgent;
  let transport: UndiciHttpTransport;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    transport = new UndiciHttpTransport(agent);
  });

  afterEach(async () => {
    await agent.close();
  });

  it('returns status, headers and body', async () => {
    agent
      .get('https://sms.test')
      .intercept({ path: '/messages', method: 'POST', body: '{"to":"+15551234567"}' })
      .reply(201, '{"sid":"SM1"}', { headers: { 'content-type': 'application/json' } });

    const response = await transport.send(
      {
        method: 'POST',
        url: 'https://sms.test/messages',
        headers: { 'Content-Type': 'application/json' },
        body: '{"to":"+15551234567"}',
      },
      { timeoutMs: 1_000 }
    );

    expect(response.status).toBe(201);
    expect(response.body).toBe('{"sid":"SM1"}');
    expect(response.headers['content-type']).toBe('application/json');
  });

  it('resolves error statuses instead of throwing', async () => {
    agent.get('https://sms.test').intercept({ path: '/messages', method: 'POST' }).reply(500, 'server error');

    const response = await transport.send(
      { method: 'POST', url: 'https://sms.test/messages', headers: {}, body: '' },
      { timeoutMs: 1_000 }
    );

    expect(response.status).toBe(500);
    expect(response.body).toBe('server error');
  });

  it('wraps connection faults in TransportNetworkError', async () => {
    agent
      .get('https://sms.test')
      .intercept({ path: '/messages', method: 'POST' })
      .replyWithError(new Error('socket hang up'));

    const failure = transport.send(
      { method: 'POST', url: 'https://sms.test/messages', headers: {}, body: '' },
      { timeoutMs: 1_000 }
    );

    await expect(failure).rejects.toBeInstanceOf(TransportNetworkError);
    await expect(failure).rejects.toMatchObject({ statusCode: NETWORK_FAILURE_STATUS });
  });

  it('aborts slow responses with TransportTimeoutError', async () => {
    agent.get('https://sms.test').intercept({ path: '/health', method: 'GET' }).reply(200, 'ok').delay(500);

    const failure = transport.send({ method: 'GET', url: 'https://sms.test/health', headers: {} }, { timeoutMs: 20 });

    await expect(failure).rejects.toBeInstanceOf(TransportTimeoutError);
    await expect(failure).rejects.toMatchObject({ timeoutMs: 20 });
  });
});
