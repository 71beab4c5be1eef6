import { getReadinessState } from './app/readiness';
import type { ChannelRegistry } from './channels/channel-registry';

export type HealthPayload = {
  status: 'ok';
  timestamp: string;
  uptime: number;
  environment: string;
  storage: string;
  readiness: ReturnType<typeof getReadinessState>;
  channels: {
    registered: number;
    defaultChannelType: string;
  };
};

export const buildHealthPayload = ({
  environment,
  channels,
}: {
  environment: string;
  channels: ChannelRegistry;
}): HealthPayload => ({
  status: 'ok',
  timestamp: new Date().toISOString(),
  uptime: process.uptime(),
  environment,
  storage: 'in-memory',
  readiness: getReadinessState(),
  channels: {
    registered: channels.list().length,
    defaultChannelType: channels.defaultType,
  },
});
