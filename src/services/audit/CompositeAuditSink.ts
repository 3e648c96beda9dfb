import type { AuditEvent, AuditSink } from '../../types/AuditTypes';

/**
 * Fans an event out to each child sink in order. Stops with the abort reason
 * once the signal is aborted; a child's failure rejects the whole record.
 */
export class CompositeAuditSink implements AuditSink {
  private readonly sinks: readonly AuditSink[];

  constructor(sinks: readonly AuditSink[] = []) {
    this.sinks = [...sinks];
  }

  get size(): number {
    return this.sinks.length;
  }

  async record(event: AuditEvent, signal?: AbortSignal): Promise<void> {
    for (const sink of this.sinks) {
      signal?.throwIfAborted();
      await sink.record(event, signal);
    }
  }
}
