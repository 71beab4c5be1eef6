import { z } from 'zod';

// ============================================================================
// Base Types
// ============================================================================

export const EntityIdSchema = z.string().uuid();
export type EntityId = z.infer<typeof EntityIdSchema>;

export const TimestampSchema = z.date();
export type Timestamp = z.infer<typeof TimestampSchema>;

// ============================================================================
// Communication Channels
// ============================================================================

export const ChannelTypeSchema = z.enum(['SMPP', 'HTTP', 'DRYRUN']);

export type ChannelType = z.infer<typeof ChannelTypeSchema>;

// ============================================================================
// Error Types
// ============================================================================

export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends DomainError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', { resource, id });
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFLICT', details);
    this.name = 'ConflictError';
  }
}
