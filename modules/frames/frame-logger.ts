export type FrameLogger = (message: string) => void;

/** Builds the logger for one frame or boundary scope, e.g. `frame:root`. */
export type FrameLoggerFactory = (scope: string) => FrameLogger;

export const silentLogger: FrameLogger = () => {};

export const silentLoggerFactory: FrameLoggerFactory = () => silentLogger;

export const frameScope = (frameId: string): string => `frame:${frameId}`;

export const boundaryScope = (boundaryId: string): string => `boundary:${boundaryId}`;

export function log(message: string, source = "frames", write: (line: string) => void = console.log) {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  write(`${formattedTime} [${source}] ${message}`);
}

/**
 * Standard-output fallback. Only the driver layer wires this in; library
 * code defaults to {@link silentLoggerFactory}.
 */
export const createConsoleLoggerFactory = (
  write: (line: string) => void = console.log,
): FrameLoggerFactory => {
  return (scope) => (message) => log(message, scope, write);
};

export type FrameEventEntry = {
  seq: number;
  scope: string;
  message: string;
};

export type FrameEventLogSnapshot = {
  entries: FrameEventEntry[];
  dropped: number;
  capacity: number;
  totalEmitted: number;
};

export class FrameEventRingBuffer<T> {
  private readonly capacity: number;
  private readonly values: T[] = [];
  private dropped = 0;

  constructor(capacity: number) {
    const normalized = Number.isFinite(capacity) ? Math.floor(capacity) : 512;
    this.capacity = Math.min(Math.max(normalized, 1), 100000);
  }

  get limit(): number {
    return this.capacity;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  push(value: T): void {
    this.values.push(value);
    if (this.values.length > this.capacity) {
      this.values.shift();
      this.dropped += 1;
    }
  }

  latest(limit?: number): T[] {
    if (this.values.length === 0) return [];
    if (limit === undefined) return [...this.values];
    const normalized = Math.max(1, Math.floor(limit));
    return this.values.slice(Math.max(0, this.values.length - normalized));
  }

  reset(): void {
    this.values.length = 0;
    this.dropped = 0;
  }
}

/**
 * In-memory event recorder. `loggerFor` hands out scoped loggers that all
 * append to one bounded buffer; `forward` receives every entry as well.
 */
export const createFrameEventLog = (options?: {
  capacity?: number;
  forward?: FrameLoggerFactory;
}) => {
  let seq = 0;
  const buffer = new FrameEventRingBuffer<FrameEventEntry>(options?.capacity ?? 512);

  const loggerFor: FrameLoggerFactory = (scope) => {
    const forwarded = options?.forward?.(scope);
    return (message) => {
      seq += 1;
      buffer.push({ seq, scope, message });
      forwarded?.(message);
    };
  };

  const recent = (limit?: number): FrameEventEntry[] => buffer.latest(limit);

  const messagesFor = (scope: string): string[] =>
    buffer
      .latest()
      .filter((entry) => entry.scope === scope)
      .map((entry) => entry.message);

  const snapshot = (limit?: number): FrameEventLogSnapshot => ({
    entries: buffer.latest(limit),
    dropped: buffer.droppedCount,
    capacity: buffer.limit,
    totalEmitted: seq,
  });

  const stats = (): { capacity: number; dropped: number; totalEmitted: number } => ({
    capacity: buffer.limit,
    dropped: buffer.droppedCount,
    totalEmitted: seq,
  });

  const reset = (): void => {
    seq = 0;
    buffer.reset();
  };

  return { loggerFor, recent, messagesFor, snapshot, stats, reset };
};

export type FrameEventLog = ReturnType<typeof createFrameEventLog>;
