import type { EventLevel, EventMetadata, Tracer } from '../types/tracer.js';

const LEVEL_PRIORITY: Record<EventLevel, number> = {
  Critical: 0,
  Error: 1,
  Warning: 2,
  Informational: 3,
  Verbose: 4,
};

export interface ConsoleTracerOptions {
  /** Least important level still written. Default: `'Informational'` */
  level?: EventLevel;
  /** Merged into every record, e.g. `{ enlistment: 'src' }`. */
  context?: EventMetadata;
}

/**
 * Errors do not survive `JSON.stringify`; keep the fields worth reading.
 */
function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    const code =
      'code' in value && typeof value.code === 'string' ? value.code : undefined;
    return { name: value.name, message: value.message, code };
  }
  return value;
}

function serializeMetadata(metadata: EventMetadata): EventMetadata {
  const serialized: EventMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    serialized[key] = serializeValue(value);
  }
  return serialized;
}

/**
 * Writes one JSON object per line to the console.
 */
export class ConsoleTracer implements Tracer {
  private readonly level: EventLevel;
  private readonly context: EventMetadata;

  constructor(options: ConsoleTracerOptions = {}) {
    this.level = options.level ?? 'Informational';
    this.context = options.context ?? {};
  }

  private shouldWrite(level: EventLevel): boolean {
    return LEVEL_PRIORITY[level] <= LEVEL_PRIORITY[this.level];
  }

  relatedEvent(
    level: EventLevel,
    eventName: string,
    metadata: EventMetadata,
  ): void {
    if (!this.shouldWrite(level)) return;

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      event: eventName,
      metadata: serializeMetadata({ ...this.context, ...metadata }),
    });

    if (level === 'Critical' || level === 'Error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  relatedError(message: string, metadata: EventMetadata = {}): void {
    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: 'Error',
        message,
        metadata: serializeMetadata({ ...this.context, ...metadata }),
      }),
    );
  }
}
