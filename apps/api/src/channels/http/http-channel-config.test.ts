import { describe, expect, it } from 'vitest';

import {
  ChannelConfigurationError,
  validateHttpChannelConfig,
  type HttpChannelConfigInput,
} from './http-channel-config';
import { awsSnsPreset, genericPreset, resolveProviderPreset, twilioPreset } from './provider-presets';

const validInput: HttpChannelConfigInput = {
  providerName: 'Acme',
  apiUrl: 'https://sms.acme.test/send',
  apiKey: 'test-secret',
  healthCheckUrl: 'https://sms.acme.test/health',
  webhookUrl: 'https://gateway.test/api/webhooks/delivery-receipts/Acme',
};

const captureError = (input: HttpChannelConfigInput): ChannelConfigurationError => {
  try {
    validateHttpChannelConfig(input);
  } catch (error) {
    if (error instanceof ChannelConfigurationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected validation to fail');
};

describe('validateHttpChannelConfig', () => {
  it('applies defaults to a minimal configuration', () => {
    const config = validateHttpChannelConfig({
      providerName: 'Acme',
      apiUrl: 'https://sms.acme.test/send',
      apiKey: 'test-secret',
    });

    expect(config).toEqual({
      providerName: 'Acme',
      apiUrl: 'https://sms.acme.test/send',
      apiKey: 'test-secret',
      authorizationType: 'Bearer',
      apiKeyHeaderName: 'X-API-Key',
      fromNumber: null,
      requestBodyTemplate: null,
      requestBodyFields: null,
      contentType: 'application/json',
      healthCheckUrl: null,
      timeoutMs: 30_000,
      maxRetryAttempts: 2,
      webhookUrl: null,
      webhookSecret: null,
      basicAuthUsername: null,
      awsAccessKeyId: null,
      awsRegion: null,
      awsService: 'sns',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it.each([
    ['providerName', { providerName: '  ' }, 'providerName is required'],
    ['apiUrl', { apiUrl: null }, 'apiUrl is required'],
    ['apiUrl', { apiUrl: '/relative/path' }, 'apiUrl must be a valid absolute URL'],
    ['apiUrl', { apiUrl: 'ftp://sms.acme.test' }, 'apiUrl must be a valid absolute URL'],
    ['apiKey', { apiKey: '' }, 'apiKey is required'],
    ['timeoutMs', { timeoutMs: 0 }, 'timeoutMs must be a positive integer'],
    ['timeoutMs', { timeoutMs: 1.5 }, 'timeoutMs must be a positive integer'],
    ['timeoutMs', { timeoutMs: 2_147_483_648 }, 'timeoutMs cannot exceed 2147483647'],
    ['requestBodyFields', { requestBodyFields: {} }, 'requestBodyFields must name at least one field and no blank ones'],
    [
      'requestBodyFields',
      { requestBodyFields: { to: '{PhoneNumber}' }, requestBodyTemplate: '{PhoneNumber}' },
      'requestBodyFields cannot be combined with requestBodyTemplate',
    ],
    ['maxRetryAttempts', { maxRetryAttempts: -1 }, 'maxRetryAttempts cannot be negative'],
    ['healthCheckUrl', { healthCheckUrl: 'not a url' }, 'healthCheckUrl must be a valid absolute URL'],
    ['webhookUrl', { webhookUrl: 'callbacks/acme' }, 'webhookUrl must be a valid absolute URL'],
  ] as const)('names %s when it is invalid', (field, override, message) => {
    const error = captureError({ ...validInput, ...override });

    expect(error.field).toBe(field);
    expect(error.message).toBe(message);
    expect(error.code).toBe('CHANNEL_CONFIGURATION_ERROR');
  });

  it('reports the first violation when several fields are wrong', () => {
    const error = captureError({ providerName: 'Acme', apiUrl: '', apiKey: '', timeoutMs: -5 });

    expect(error.field).toBe('apiUrl');
    expect(error.providerName).toBe('Acme');
  });

  it('rejects an unsupported authorization type at configuration time', () => {
    const error = captureError({ ...validInput, authorizationType: 'Digest' });

    expect(error.field).toBe('authorizationType');
  });

  it('matches authorization types without regard to case', () => {
    expect(validateHttpChannelConfig({ ...validInput, authorizationType: 'apikey' }).authorizationType).toBe('ApiKey');
  });

  it('requires a username for Basic authorization', () => {
    expect(captureError({ ...validInput, authorizationType: 'Basic' }).field).toBe('basicAuthUsername');
  });

  it('requires an access key id and region for AWS authorization', () => {
    expect(captureError({ ...validInput, authorizationType: 'AWS' }).field).toBe('awsAccessKeyId');
    expect(captureError({ ...validInput, authorizationType: 'AWS', awsAccessKeyId: 'AKIDTEST' }).field).toBe(
      'awsRegion'
    );
  });

  it('accepts the largest timer delay', () => {
    expect(validateHttpChannelConfig({ ...validInput, timeoutMs: 2_147_483_647 }).timeoutMs).toBe(2_147_483_647);
  });

  it('keeps body templates byte for byte', () => {
    const template = ' {"to":"{PhoneNumber}"} ';
    expect(validateHttpChannelConfig({ ...validInput, requestBodyTemplate: template }).requestBodyTemplate).toBe(
      template
    );
  });
});

describe('provider presets', () => {
  it('produces a valid Twilio configuration', () => {
    const config = validateHttpChannelConfig(twilioPreset('ACtest', 'test-secret', '+15550000000'));

    expect(config.apiUrl).toBe('https://api.twilio.com/2010-04-01/Accounts/ACtest/Messages.json');
    expect(config.authorizationType).toBe('Basic');
    expect(config.basicAuthUsername).toBe('ACtest');
    expect(config.contentType).toBe('application/x-www-form-urlencoded');
    expect(config.requestBodyTemplate).toBeNull();
    expect(config.requestBodyFields).toEqual({ To: '{PhoneNumber}', From: '{From}', Body: '{Content}' });
    expect(config.timeoutMs).toBe(10_000);
  });

  it('produces a valid AWS SNS configuration', () => {
    const config = validateHttpChannelConfig(awsSnsPreset('AKIDTEST', 'test-secret', 'eu-west-1'));

    expect(config.apiUrl).toBe('https://sns.eu-west-1.amazonaws.com/');
    expect(config.authorizationType).toBe('AWS');
    expect(config.awsRegion).toBe('eu-west-1');
    expect(config.awsService).toBe('sns');
  });

  it('produces a valid generic configuration', () => {
    const config = validateHttpChannelConfig(genericPreset('Acme', 'https://sms.acme.test/send', 'test-secret'));

    expect(config.authorizationType).toBe('Bearer');
    expect(config.fromNumber).toBeNull();
  });

  it('resolves preset names loosely', () => {
    expect(resolveProviderPreset(' Twilio ')).toBe('twilio');
    expect(resolveProviderPreset('AWS-SNS')).toBe('aws-sns');
    expect(resolveProviderPreset('nexmo')).toBeNull();
    expect(resolveProviderPreset(undefined)).toBeNull();
  });
});
