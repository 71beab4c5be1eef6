import { DomainError } from '../common/types';

export enum MessageStatus {
  CREATED = 'created',
  SENT = 'sent',
  FAILED = 'failed',
  ASSUMED_DELIVERED = 'assumed_delivered',
  DELIVERY_UNKNOWN = 'delivery_unknown',
  DELIVERED = 'delivered',
  PARTIALLY_DELIVERED = 'partially_delivered',
  EXPIRED = 'expired',
  REJECTED = 'rejected',
  UNDELIVERED = 'undelivered',
}

export const INITIAL_MESSAGE_STATUS = MessageStatus.CREATED;

/** Outcomes a delivery receipt can settle a message into. */
const RECEIPT_OUTCOMES: readonly MessageStatus[] = [
  MessageStatus.DELIVERED,
  MessageStatus.PARTIALLY_DELIVERED,
  MessageStatus.EXPIRED,
  MessageStatus.REJECTED,
  MessageStatus.UNDELIVERED,
];

const statusEntries: Array<[MessageStatus, ReadonlySet<MessageStatus>]> = [
  [MessageStatus.CREATED, new Set([MessageStatus.CREATED, MessageStatus.SENT, MessageStatus.FAILED])],
  [
    MessageStatus.SENT,
    new Set([
      MessageStatus.SENT,
      MessageStatus.ASSUMED_DELIVERED,
      MessageStatus.DELIVERY_UNKNOWN,
      ...RECEIPT_OUTCOMES,
    ]),
  ],
  // Heuristic states: a late receipt still settles the message.
  [MessageStatus.ASSUMED_DELIVERED, new Set([MessageStatus.ASSUMED_DELIVERED, ...RECEIPT_OUTCOMES])],
  [MessageStatus.DELIVERY_UNKNOWN, new Set([MessageStatus.DELIVERY_UNKNOWN, ...RECEIPT_OUTCOMES])],
  [MessageStatus.DELIVERED, new Set([MessageStatus.DELIVERED])],
  // Remaining parts can still arrive.
  [MessageStatus.PARTIALLY_DELIVERED, new Set([MessageStatus.PARTIALLY_DELIVERED, MessageStatus.DELIVERED])],
  [MessageStatus.FAILED, new Set([MessageStatus.FAILED])],
  [MessageStatus.EXPIRED, new Set([MessageStatus.EXPIRED])],
  [MessageStatus.REJECTED, new Set([MessageStatus.REJECTED])],
  [MessageStatus.UNDELIVERED, new Set([MessageStatus.UNDELIVERED])],
];

export const MESSAGE_STATUS_TRANSITIONS: ReadonlyMap<MessageStatus, ReadonlySet<MessageStatus>> = new Map(
  statusEntries.map(([status, targets]) => [status, new Set(targets)])
);

export class InvalidStatusTransitionError extends DomainError {
  constructor(
    public readonly from: MessageStatus,
    public readonly to: MessageStatus
  ) {
    super(`Invalid message status transition from "${from}" to "${to}"`, 'INVALID_STATUS_TRANSITION', {
      from,
      to,
    });
    this.name = 'InvalidStatusTransitionError';
  }
}

export const canTransition = (from: MessageStatus, to: MessageStatus): boolean => {
  const targets = MESSAGE_STATUS_TRANSITIONS.get(from);
  return targets ? targets.has(to) : false;
};

export const assertTransition = (from: MessageStatus, to: MessageStatus): void => {
  if (!canTransition(from, to)) {
    throw new InvalidStatusTransitionError(from, to);
  }
};

export const isTerminalStatus = (status: MessageStatus): boolean => {
  const targets = MESSAGE_STATUS_TRANSITIONS.get(status);
  return !targets || (targets.size === 1 && targets.has(status));
};

export const STATUS_LABELS: Readonly<Record<MessageStatus, string>> = {
  [MessageStatus.CREATED]: 'Processing...',
  [MessageStatus.SENT]: 'Sent (DLR pending)',
  [MessageStatus.FAILED]: 'Failed',
  [MessageStatus.ASSUMED_DELIVERED]: 'Assumed Delivered (no DLR received)',
  [MessageStatus.DELIVERY_UNKNOWN]: 'Delivery Unknown (DLR timeout)',
  [MessageStatus.DELIVERED]: 'Delivered (confirmed)',
  [MessageStatus.PARTIALLY_DELIVERED]: 'Partially delivered (some parts confirmed)',
  [MessageStatus.EXPIRED]: 'Expired before delivery',
  [MessageStatus.REJECTED]: 'Rejected by network or recipient',
  [MessageStatus.UNDELIVERED]: 'Undelivered',
};

export const describeStatus = (status: MessageStatus): string => STATUS_LABELS[status];

const RECEIPT_STATUS_MAP: Record<string, MessageStatus> = {
  // SMPP receipt stat codes
  delivrd: MessageStatus.DELIVERED,
  expired: MessageStatus.EXPIRED,
  deleted: MessageStatus.EXPIRED,
  undeliv: MessageStatus.UNDELIVERED,
  rejectd: MessageStatus.REJECTED,
  acceptd: MessageStatus.SENT,
  enroute: MessageStatus.SENT,
  unknown: MessageStatus.DELIVERY_UNKNOWN,
  // HTTP provider callbacks
  delivered: MessageStatus.DELIVERED,
  delivery_success: MessageStatus.DELIVERED,
  success: MessageStatus.DELIVERED,
  undelivered: MessageStatus.UNDELIVERED,
  failed: MessageStatus.UNDELIVERED,
  failure: MessageStatus.UNDELIVERED,
  rejected: MessageStatus.REJECTED,
  blocked: MessageStatus.REJECTED,
  accepted: MessageStatus.SENT,
  queued: MessageStatus.SENT,
  sending: MessageStatus.SENT,
  sent: MessageStatus.SENT,
  pending: MessageStatus.SENT,
};

/**
 * Maps a raw receipt status (SMPP `stat:` code or a provider callback word) onto the lifecycle.
 * Unrecognised values resolve to DELIVERY_UNKNOWN.
 */
export const mapDeliveryReceiptStatus = (raw: string | null | undefined): MessageStatus => {
  if (typeof raw !== 'string') {
    return MessageStatus.DELIVERY_UNKNOWN;
  }

  const normalized = raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return RECEIPT_STATUS_MAP[normalized] ?? MessageStatus.DELIVERY_UNKNOWN;
};

/**
 * Overall status of a multi-part message from the statuses of its parts. Any delivered part makes
 * the message at least partially delivered; an undelivered mix with nothing pending is undelivered.
 */
export const rollUpPartStatuses = (statuses: readonly MessageStatus[]): MessageStatus => {
  const [first] = statuses;
  if (first === undefined) {
    return MessageStatus.SENT;
  }

  const delivered = statuses.filter((status) => status === MessageStatus.DELIVERED).length;
  if (delivered === statuses.length) {
    return MessageStatus.DELIVERED;
  }
  if (delivered > 0) {
    return MessageStatus.PARTIALLY_DELIVERED;
  }
  if (statuses.includes(MessageStatus.SENT)) {
    return MessageStatus.SENT;
  }
  return statuses.every((status) => status === first) ? first : MessageStatus.UNDELIVERED;
};

export const parseMessageStatus = (value: string | null | undefined): MessageStatus | null => {
  if (typeof value !== 'string') {
    return null;
  }

  const normalized = value
    .trim()
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[\s-]+/g, '_');
  const match = Object.values(MessageStatus).find((status) => status === normalized);
  return match ?? null;
};
