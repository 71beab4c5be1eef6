import { ChannelConfigurationError, MAX_TIMEOUT_MS } from '../http/http-channel-config';

export const SMPP_PROVIDER_NAME = 'SMPP';
export const DEFAULT_SMPP_PORT = 2775;
export const DEFAULT_SOURCE_ADDRESS = 'SmsGateway';
export const DEFAULT_MAX_CONNECTIONS = 3;
export const DEFAULT_MAX_SUBMIT_RETRIES = 2;

export const DEFAULT_SMPP_TIMEOUTS = Object.freeze({
  keepAliveIntervalMs: 30_000,
  connectionTimeoutMs: 30_000,
  bindTimeoutMs: 15_000,
  submitTimeoutMs: 10_000,
  apiTimeoutMs: 45_000,
});

export type SmppChannelConfigInput = {
  providerName?: string | null;
  host?: string | null;
  port?: number | null;
  systemId?: string | null;
  password?: string | null;
  systemType?: string | null;
  sourceAddress?: string | null;
  maxConnections?: number | null;
  maxSubmitRetries?: number | null;
  keepAliveIntervalMs?: number | null;
  connectionTimeoutMs?: number | null;
  bindTimeoutMs?: number | null;
  submitTimeoutMs?: number | null;
  apiTimeoutMs?: number | null;
  expectDeliveryReceipts?: boolean | null;
};

export type SmppChannelConfig = Readonly<{
  providerName: string;
  host: string;
  port: number;
  systemId: string;
  password: string;
  systemType: string;
  sourceAddress: string;
  maxConnections: number;
  maxSubmitRetries: number;
  keepAliveIntervalMs: number;
  connectionTimeoutMs: number;
  bindTimeoutMs: number;
  submitTimeoutMs: number;
  /** Upper bound on a whole send, retries included. */
  apiTimeoutMs: number;
  expectDeliveryReceipts: boolean;
}>;

export type SmppChannelConfigField = keyof SmppChannelConfig;

type TimeoutField = keyof typeof DEFAULT_SMPP_TIMEOUTS;

const TIMEOUT_FIELDS: readonly TimeoutField[] = [
  'keepAliveIntervalMs',
  'connectionTimeoutMs',
  'bindTimeoutMs',
  'submitTimeoutMs',
  'apiTimeoutMs',
];

const normalizeString = (value: string | null | undefined): string | null => {
  const trimmed = typeof value === 'string' ? value.trim() : '';
  return trimmed.length > 0 ? trimmed : null;
};

/** Validates the SMSC connection settings; throws a ChannelConfigurationError on the first bad field. */
export const validateSmppChannelConfig = (input: SmppChannelConfigInput): SmppChannelConfig => {
  const providerName = normalizeString(input.providerName) ?? SMPP_PROVIDER_NAME;
  const fail = (field: SmppChannelConfigField, message: string): never => {
    throw new ChannelConfigurationError(field, message, providerName);
  };

  const host = normalizeString(input.host);
  if (!host) {
    return fail('host', 'host is required');
  }

  const port = input.port ?? DEFAULT_SMPP_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    return fail('port', 'port must be between 1 and 65535');
  }

  const systemId = normalizeString(input.systemId);
  if (!systemId) {
    return fail('systemId', 'systemId is required');
  }

  const password = normalizeString(input.password);
  if (!password) {
    return fail('password', 'password is required');
  }

  const maxConnections = input.maxConnections ?? DEFAULT_MAX_CONNECTIONS;
  if (!Number.isInteger(maxConnections) || maxConnections <= 0) {
    return fail('maxConnections', 'maxConnections must be a positive integer');
  }

  const maxSubmitRetries = input.maxSubmitRetries ?? DEFAULT_MAX_SUBMIT_RETRIES;
  if (!Number.isInteger(maxSubmitRetries) || maxSubmitRetries < 0) {
    return fail('maxSubmitRetries', 'maxSubmitRetries cannot be negative');
  }

  const timeouts: Record<TimeoutField, number> = { ...DEFAULT_SMPP_TIMEOUTS };
  for (const field of TIMEOUT_FIELDS) {
    const value = input[field] ?? DEFAULT_SMPP_TIMEOUTS[field];
    if (!Number.isInteger(value) || value <= 0) {
      return fail(field, `${field} must be a positive integer`);
    }
    if (value > MAX_TIMEOUT_MS) {
      return fail(field, `${field} cannot exceed ${MAX_TIMEOUT_MS}`);
    }
    timeouts[field] = value;
  }

  return Object.freeze({
    providerName,
    host,
    port,
    systemId,
    password,
    systemType: normalizeString(input.systemType) ?? '',
    sourceAddress: normalizeString(input.sourceAddress) ?? DEFAULT_SOURCE_ADDRESS,
    maxConnections,
    maxSubmitRetries,
    ...timeouts,
    expectDeliveryReceipts: input.expectDeliveryReceipts ?? true,
  });
};
