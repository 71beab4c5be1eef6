import { describe, expect, it } from 'vitest';

import { buildHttpChannelConfig } from '../../test-utils/channel-stubs';
import { authorizeRequest } from './authorization';
import type { TransportRequest } from './transport';

const baseRequest: TransportRequest = {
  method: 'POST',
  url: 'https://sns.us-east-1.amazonaws.com/?Action=Publish',
  headers: { 'Content-Type': 'application/json; charset=utf-8' },
  body: '{"to":"+15551234567"}',
};

describe('authorizeRequest', () => {
  it('adds a bearer token', async () => {
    const request = await authorizeRequest(baseRequest, buildHttpChannelConfig());

    expect(request.headers.Authorization).toBe('Bearer test-secret');
    expect(request.headers['Content-Type']).toBe('application/json; charset=utf-8');
    expect(baseRequest.headers).not.toHaveProperty('Authorization');
  });

  it('places the key in the configured header', async () => {
    const config = buildHttpChannelConfig({ authorizationType: 'ApiKey', apiKeyHeaderName: 'X-Auth-Token' });

    const request = await authorizeRequest(baseRequest, config);

    expect(request.headers['X-Auth-Token']).toBe('test-secret');
    expect(request.headers).not.toHaveProperty('Authorization');
  });

  it('encodes basic credentials', async () => {
    const config = buildHttpChannelConfig({ authorizationType: 'Basic', basicAuthUsername: 'ACtest' });

    const request = await authorizeRequest(baseRequest, config);

    expect(request.headers.Authorization).toBe(`Basic ${Buffer.from('ACtest:test-secret').toString('base64')}`);
  });

  it('signs AWS requests with SigV4 and leaves the host header to the client', async () => {
    const config = buildHttpChannelConfig({
      authorizationType: 'AWS',
      awsAccessKeyId: 'AKIDTEST',
      awsRegion: 'us-east-1',
    });

    const request = await authorizeRequest(baseRequest, config, {
      signingDate: new Date('2026-01-01T00:00:00.000Z'),
    });

    expect(request.headers.authorization).toMatch(
      /^AWS4-HMAC-SHA256 Credential=AKIDTEST\/20260101\/us-east-1\/sns\/aws4_request, SignedHeaders=/
    );
    expect(request.headers['x-amz-date']).toBe('20260101T000000Z');
    expect(Object.keys(request.headers).map((name) => name.toLowerCase())).not.toContain('host');
    expect(request.body).toBe(baseRequest.body);
    expect(request.url).toBe(baseRequest.url);
  });

  it('produces the same AWS signature for the same request and date', async () => {
    const config = buildHttpChannelConfig({
      authorizationType: 'AWS',
      awsAccessKeyId: 'AKIDTEST',
      awsRegion: 'us-east-1',
    });
    const signingDate = new Date('2026-01-01T00:00:00.000Z');

    const first = await authorizeRequest(baseRequest, config, { signingDate });
    const second = await authorizeRequest(baseRequest, config, { signingDate });

    expect(second.headers.authorization).toBe(first.headers.authorization);
  });
});
