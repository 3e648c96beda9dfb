import { v4 as uuidv4 } from 'uuid';
import { InvocationScope, InvokeOptions } from '../../types/CommonTypes';

/**
 * TraceService - correlation id generation and per-call scope construction
 */
export class TraceService {
  /**
   * Generate a new correlation ID
   */
  generateCorrelationId(): string {
    return `call-${Date.now()}-${uuidv4()}`;
  }

  /**
   * Generate an audit event ID
   */
  generateEventId(): string {
    return `evt-${uuidv4()}`;
  }

  /**
   * Build the immutable scope for one invocation
   */
  createScope(options: InvokeOptions = {}): InvocationScope {
    const attributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(options.attributes ?? {})) {
      attributes[key.toLowerCase()] = value;
    }

    return Object.freeze({
      correlationId: options.correlationId || this.generateCorrelationId(),
      identity: options.identity,
      attributes: Object.freeze(attributes),
      signal: options.signal,
    });
  }
}
