export {
  DomainError,
  ValidationError,
  NotFoundError,
  ConflictError,
  ChannelTypeSchema,
  EntityIdSchema,
  TimestampSchema,
} from './common/types';

export type { ChannelType, EntityId, Timestamp } from './common/types';

export * from './messages/status';
export * from './messages/types';
