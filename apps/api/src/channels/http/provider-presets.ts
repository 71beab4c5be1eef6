import type { HttpChannelConfigInput } from './http-channel-config';

export const PROVIDER_PRESETS = ['generic', 'twilio', 'aws-sns'] as const;

export type ProviderPreset = (typeof PROVIDER_PRESETS)[number];

// Both APIs take form-encoded bodies, so the presets use encoded fields rather than a literal template.
const TWILIO_BODY_FIELDS = { To: '{PhoneNumber}', From: '{From}', Body: '{Content}' };
const AWS_SNS_BODY_FIELDS = {
  Action: 'Publish',
  Version: '2010-03-31',
  PhoneNumber: '{PhoneNumber}',
  Message: '{Content}',
};
const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

export const twilioPreset = (accountSid: string, authToken: string, fromNumber: string): HttpChannelConfigInput => ({
  providerName: 'Twilio',
  apiUrl: `https://api.twilio.com/2010-04-01/Accounts/${accountSid}/Messages.json`,
  apiKey: authToken,
  authorizationType: 'Basic',
  basicAuthUsername: accountSid,
  fromNumber,
  requestBodyFields: TWILIO_BODY_FIELDS,
  contentType: FORM_CONTENT_TYPE,
  healthCheckUrl: `https://api.twilio.com/2010-04-01/Accounts/${accountSid}.json`,
  timeoutMs: 10_000,
});

export const awsSnsPreset = (
  accessKeyId: string,
  secretAccessKey: string,
  region = 'us-east-1'
): HttpChannelConfigInput => ({
  providerName: 'AWS_SNS',
  apiUrl: `https://sns.${region}.amazonaws.com/`,
  apiKey: secretAccessKey,
  authorizationType: 'AWS',
  awsAccessKeyId: accessKeyId,
  awsRegion: region,
  awsService: 'sns',
  requestBodyFields: AWS_SNS_BODY_FIELDS,
  contentType: FORM_CONTENT_TYPE,
  timeoutMs: 15_000,
});

export const genericPreset = (
  providerName: string,
  apiUrl: string,
  apiKey: string,
  fromNumber?: string | null
): HttpChannelConfigInput => ({
  providerName,
  apiUrl,
  apiKey,
  authorizationType: 'Bearer',
  fromNumber: fromNumber ?? null,
  timeoutMs: 10_000,
});

export const resolveProviderPreset = (value: string | null | undefined): ProviderPreset | null => {
  const normalized = value?.trim().toLowerCase();
  return PROVIDER_PRESETS.find((preset) => preset === normalized) ?? null;
};
