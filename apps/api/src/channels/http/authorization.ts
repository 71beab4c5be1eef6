import { Sha256 } from '@aws-crypto/sha256-js';
import { SignatureV4 } from '@smithy/signature-v4';

import type { HttpChannelConfig } from './http-channel-config';
import type { TransportRequest } from './transport';

export type AuthorizationOptions = {
  /** Clock used for AWS signatures; defaults to now. */
  signingDate?: Date;
};

const encodeBasicCredentials = (username: string, password: string): string =>
  Buffer.from(`${username}:${password}`).toString('base64');

const toQueryBag = (params: URLSearchParams): Record<string, string | string[]> => {
  const bag: Record<string, string | string[]> = {};
  for (const key of new Set(params.keys())) {
    const values = params.getAll(key);
    bag[key] = values.length === 1 ? values[0] ?? '' : values;
  }
  return bag;
};

const signAwsRequest = async (
  request: TransportRequest,
  config: HttpChannelConfig,
  signingDate: Date
): Promise<TransportRequest> => {
  if (!config.awsAccessKeyId || !config.awsRegion) {
    throw new Error('AWS authorization requires awsAccessKeyId and awsRegion');
  }

  const url = new URL(request.url);
  const signer = new SignatureV4({
    credentials: { accessKeyId: config.awsAccessKeyId, secretAccessKey: config.apiKey },
    region: config.awsRegion,
    service: config.awsService,
    sha256: Sha256,
  });

  const signed = await signer.sign(
    {
      method: request.method,
      protocol: url.protocol,
      hostname: url.hostname,
      port: url.port ? Number(url.port) : undefined,
      path: url.pathname,
      query: toQueryBag(url.searchParams),
      headers: { ...request.headers, host: url.host },
      body: request.body,
    },
    { signingDate }
  );

  // The HTTP client derives Host from the URL itself.
  const headers = Object.fromEntries(
    Object.entries(signed.headers).filter(([name]) => name.toLowerCase() !== 'host')
  );
  return { ...request, headers };
};

/**
 * Returns a copy of the request carrying the credentials the provider expects.
 * AWS signatures cover the body, so this must run after the body is final.
 */
export const authorizeRequest = async (
  request: TransportRequest,
  config: HttpChannelConfig,
  options: AuthorizationOptions = {}
): Promise<TransportRequest> => {
  switch (config.authorizationType) {
    case 'Bearer':
      return { ...request, headers: { ...request.headers, Authorization: `Bearer ${config.apiKey}` } };
    case 'ApiKey':
      return { ...request, headers: { ...request.headers, [config.apiKeyHeaderName]: config.apiKey } };
    case 'Basic': {
      if (!config.basicAuthUsername) {
        throw new Error('Basic authorization requires basicAuthUsername');
      }
      const token = encodeBasicCredentials(config.basicAuthUsername, config.apiKey);
      return { ...request, headers: { ...request.headers, Authorization: `Basic ${token}` } };
    }
    case 'AWS':
      return signAwsRequest(request, config, options.signingDate ?? new Date());
  }
};
