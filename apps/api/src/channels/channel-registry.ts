import { ConflictError, type ChannelType } from '@sms-gateway/core';

import type { MessageChannel } from './types';

export type ChannelSelector = {
  channelType?: ChannelType | null;
  providerName?: string | null;
};

export type ChannelSummary = {
  channelType: ChannelType;
  providerName: string;
  expectsDeliveryReceipts: boolean;
  healthy: boolean;
};

const sameName = (left: string, right: string): boolean => left.trim().toLowerCase() === right.trim().toLowerCase();

export class ChannelRegistry {
  private readonly channels: MessageChannel[] = [];

  constructor(private readonly defaultChannelType: ChannelType = 'HTTP') {}

  get defaultType(): ChannelType {
    return this.defaultChannelType;
  }

  register(channel: MessageChannel): this {
    const duplicate = this.channels.find(
      (candidate) =>
        candidate.channelType === channel.channelType && sameName(candidate.providerName, channel.providerName)
    );
    if (duplicate) {
      throw new ConflictError(`Channel ${channel.channelType}/${channel.providerName} is already registered`, {
        channelType: channel.channelType,
        providerName: channel.providerName,
      });
    }

    this.channels.push(channel);
    return this;
  }

  /**
   * Picks the channel for a send. A provider name narrows the match; without one the first channel
   * registered for the type wins.
   */
  resolve(selector: ChannelSelector = {}): MessageChannel | null {
    const channelType = selector.channelType ?? this.defaultChannelType;
    const providerName = selector.providerName?.trim();

    const match = this.channels.find(
      (channel) =>
        channel.channelType === channelType && (!providerName || sameName(channel.providerName, providerName))
    );
    return match ?? null;
  }

  findByProviderName(providerName: string): MessageChannel | null {
    return this.channels.find((channel) => sameName(channel.providerName, providerName)) ?? null;
  }

  list(): MessageChannel[] {
    return [...this.channels];
  }

  async describe(): Promise<ChannelSummary[]> {
    return Promise.all(
      this.channels.map(async (channel) => ({
        channelType: channel.channelType,
        providerName: channel.providerName,
        expectsDeliveryReceipts: channel.expectsDeliveryReceipts,
        healthy: await channel.isHealthy().catch(() => false),
      }))
    );
  }
}
