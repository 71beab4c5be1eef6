import { describe, expect, it } from 'vitest';

import {
  MESSAGE_STATUS_TRANSITIONS,
  MessageStatus,
  assertTransition,
  canTransition,
  describeStatus,
  isTerminalStatus,
  mapDeliveryReceiptStatus,
  parseMessageStatus,
  rollUpPartStatuses,
} from './status';

describe('message status transitions', () => {
  it('moves a created message to sent or failed', () => {
    expect(canTransition(MessageStatus.CREATED, MessageStatus.SENT)).toBe(true);
    expect(canTransition(MessageStatus.CREATED, MessageStatus.FAILED)).toBe(true);
  });

  it('requires a message to be sent before it can be delivered', () => {
    expect(canTransition(MessageStatus.CREATED, MessageStatus.DELIVERED)).toBe(false);
    expect(canTransition(MessageStatus.CREATED, MessageStatus.ASSUMED_DELIVERED)).toBe(false);
    expect(canTransition(MessageStatus.SENT, MessageStatus.DELIVERED)).toBe(true);
  });

  it('lets a sent message settle into the heuristic states', () => {
    expect(canTransition(MessageStatus.SENT, MessageStatus.ASSUMED_DELIVERED)).toBe(true);
    expect(canTransition(MessageStatus.SENT, MessageStatus.DELIVERY_UNKNOWN)).toBe(true);
  });

  it('accepts a late receipt after a heuristic state', () => {
    expect(canTransition(MessageStatus.ASSUMED_DELIVERED, MessageStatus.DELIVERED)).toBe(true);
    expect(canTransition(MessageStatus.DELIVERY_UNKNOWN, MessageStatus.REJECTED)).toBe(true);
    expect(canTransition(MessageStatus.ASSUMED_DELIVERED, MessageStatus.SENT)).toBe(false);
  });

  it('treats delivered as terminal', () => {
    expect(isTerminalStatus(MessageStatus.DELIVERED)).toBe(true);
    for (const status of Object.values(MessageStatus)) {
      if (status !== MessageStatus.DELIVERED) {
        expect(canTransition(MessageStatus.DELIVERED, status)).toBe(false);
      }
    }
  });

  it('does not treat sent as terminal', () => {
    expect(isTerminalStatus(MessageStatus.SENT)).toBe(false);
    expect(isTerminalStatus(MessageStatus.FAILED)).toBe(true);
  });

  it('allows remaining in the same status for idempotent updates', () => {
    for (const status of Object.values(MessageStatus)) {
      expect(canTransition(status, status)).toBe(true);
    }
  });

  it('throws when asserting invalid transitions', () => {
    expect(() => assertTransition(MessageStatus.FAILED, MessageStatus.SENT)).toThrowError(
      'Invalid message status transition from "failed" to "sent"'
    );
  });

  it('declares transitions for every status', () => {
    expect(MESSAGE_STATUS_TRANSITIONS.size).toBe(Object.values(MessageStatus).length);
  });

  it('lets a partially delivered message complete but not regress', () => {
    expect(canTransition(MessageStatus.SENT, MessageStatus.PARTIALLY_DELIVERED)).toBe(true);
    expect(canTransition(MessageStatus.PARTIALLY_DELIVERED, MessageStatus.DELIVERED)).toBe(true);
    expect(canTransition(MessageStatus.PARTIALLY_DELIVERED, MessageStatus.SENT)).toBe(false);
    expect(canTransition(MessageStatus.PARTIALLY_DELIVERED, MessageStatus.ASSUMED_DELIVERED)).toBe(false);
    expect(isTerminalStatus(MessageStatus.PARTIALLY_DELIVERED)).toBe(false);
  });
});

describe('status labels', () => {
  it('describes a sent message as waiting for its receipt', () => {
    expect(describeStatus(MessageStatus.SENT)).toBe('Sent (DLR pending)');
    expect(describeStatus(MessageStatus.DELIVERED)).toBe('Delivered (confirmed)');
  });
});

describe('mapDeliveryReceiptStatus', () => {
  it('maps SMPP stat codes', () => {
    expect(mapDeliveryReceiptStatus('DELIVRD')).toBe(MessageStatus.DELIVERED);
    expect(mapDeliveryReceiptStatus('DELETED')).toBe(MessageStatus.EXPIRED);
    expect(mapDeliveryReceiptStatus('UNDELIV')).toBe(MessageStatus.UNDELIVERED);
    expect(mapDeliveryReceiptStatus('REJECTD')).toBe(MessageStatus.REJECTED);
    expect(mapDeliveryReceiptStatus('ENROUTE')).toBe(MessageStatus.SENT);
  });

  it('maps provider callback words regardless of case and spacing', () => {
    expect(mapDeliveryReceiptStatus(' Delivered ')).toBe(MessageStatus.DELIVERED);
    expect(mapDeliveryReceiptStatus('undelivered')).toBe(MessageStatus.UNDELIVERED);
    expect(mapDeliveryReceiptStatus('DELIVERY-SUCCESS')).toBe(MessageStatus.DELIVERED);
  });

  it('falls back to delivery unknown', () => {
    expect(mapDeliveryReceiptStatus('something-else')).toBe(MessageStatus.DELIVERY_UNKNOWN);
    expect(mapDeliveryReceiptStatus(null)).toBe(MessageStatus.DELIVERY_UNKNOWN);
  });
});

describe('rollUpPartStatuses', () => {
  const { SENT, DELIVERED, PARTIALLY_DELIVERED, EXPIRED, REJECTED, UNDELIVERED } = MessageStatus;

  it.each([
    [[DELIVERED, DELIVERED], DELIVERED],
    [[DELIVERED, SENT], PARTIALLY_DELIVERED],
    [[DELIVERED, REJECTED, SENT], PARTIALLY_DELIVERED],
    [[SENT, SENT], SENT],
    [[EXPIRED, SENT], SENT],
    [[EXPIRED, EXPIRED], EXPIRED],
    [[EXPIRED, REJECTED], UNDELIVERED],
  ] as const)('rolls %j up to %s', (parts, expected) => {
    expect(rollUpPartStatuses(parts)).toBe(expected);
  });

  it('treats a message without parts as still waiting', () => {
    expect(rollUpPartStatuses([])).toBe(SENT);
  });
});

describe('parseMessageStatus', () => {
  it('accepts snake, camel and spaced spellings', () => {
    expect(parseMessageStatus('assumed_delivered')).toBe(MessageStatus.ASSUMED_DELIVERED);
    expect(parseMessageStatus('AssumedDelivered')).toBe(MessageStatus.ASSUMED_DELIVERED);
    expect(parseMessageStatus('delivery unknown')).toBe(MessageStatus.DELIVERY_UNKNOWN);
  });

  it('returns null for unknown values', () => {
    expect(parseMessageStatus('later')).toBeNull();
    expect(parseMessageStatus(undefined)).toBeNull();
  });
});
