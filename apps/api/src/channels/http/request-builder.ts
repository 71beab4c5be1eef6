import type { OutboundMessage } from '@sms-gateway/core';

import { authorizeRequest, type AuthorizationOptions } from './authorization';
import type { HttpChannelConfig } from './http-channel-config';
import type { TransportRequest } from './transport';

export const DEFAULT_SENDER = 'SmsGateway';
export const USER_AGENT = 'sms-gateway-http-channel/1.0';

const PLACEHOLDERS = {
  phoneNumber: '{PhoneNumber}',
  content: '{Content}',
  from: '{From}',
} as const;

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

const baseHeaders = (config: HttpChannelConfig): Record<string, string> => ({
  'Content-Type': `${config.contentType}; charset=utf-8`,
  Accept: 'application/json',
  'User-Agent': USER_AGENT,
});

/**
 * Fills a provider template. Substitution is literal: values are neither JSON- nor URL-escaped,
 * so templates must not place user content where its characters carry meaning.
 */
export const renderBodyTemplate = (template: string, message: OutboundMessage, sender: string): string =>
  template
    .split(PLACEHOLDERS.phoneNumber)
    .join(message.recipient)
    .split(PLACEHOLDERS.content)
    .join(message.content)
    .split(PLACEHOLDERS.from)
    .join(sender);

/**
 * Fills each named field, then encodes the whole body: form bodies through URLSearchParams, anything
 * else as a JSON object. Unlike templates, values cannot break out of their field.
 */
export const renderBodyFields = (
  fields: Readonly<Record<string, string>>,
  message: OutboundMessage,
  sender: string,
  contentType: string
): string => {
  const rendered = Object.entries(fields).map(([name, value]): [string, string] => [
    name,
    renderBodyTemplate(value, message, sender),
  ]);

  const mediaType = contentType.split(';')[0]?.trim().toLowerCase();
  return mediaType === FORM_CONTENT_TYPE
    ? new URLSearchParams(rendered).toString()
    : JSON.stringify(Object.fromEntries(rendered));
};

export const buildRequestBody = (message: OutboundMessage, config: HttpChannelConfig): string => {
  const sender = config.fromNumber ?? DEFAULT_SENDER;
  if (config.requestBodyTemplate) {
    return renderBodyTemplate(config.requestBodyTemplate, message, sender);
  }
  if (config.requestBodyFields) {
    return renderBodyFields(config.requestBodyFields, message, sender, config.contentType);
  }

  const payload: { to: string; message: string; from?: string } = {
    to: message.recipient,
    message: message.content,
  };
  if (config.fromNumber) {
    payload.from = config.fromNumber;
  }
  return JSON.stringify(payload);
};

export const buildSendRequest = async (
  message: OutboundMessage,
  config: HttpChannelConfig,
  options: AuthorizationOptions = {}
): Promise<TransportRequest> =>
  authorizeRequest(
    {
      method: 'POST',
      url: config.apiUrl,
      headers: baseHeaders(config),
      body: buildRequestBody(message, config),
    },
    config,
    options
  );

export const buildHealthCheckRequest = async (
  config: HttpChannelConfig,
  options: AuthorizationOptions = {}
): Promise<TransportRequest | null> => {
  if (!config.healthCheckUrl) {
    return null;
  }

  return authorizeRequest(
    {
      method: 'GET',
      url: config.healthCheckUrl,
      headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
    },
    config,
    options
  );
};
