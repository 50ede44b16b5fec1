export type EventLevel =
  | 'Critical'
  | 'Error'
  | 'Warning'
  | 'Informational'
  | 'Verbose';

export type EventMetadata = Record<string, unknown>;

/**
 * Structured event sink. Implementations decide where records go; the
 * requestor only hands them key/value metadata.
 */
export interface Tracer {
  relatedEvent(
    level: EventLevel,
    eventName: string,
    metadata: EventMetadata,
  ): void;

  relatedError(message: string, metadata?: EventMetadata): void;
}
