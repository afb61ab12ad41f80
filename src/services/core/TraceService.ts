import { v4 as uuidv4 } from 'uuid';
import { TraceContext } from '../../types/CommonTypes';

/**
 * TraceService - Trace ID generation and propagation
 */
export class TraceService {
  /**
   * Generate a new trace ID
   */
  generateTraceId(): string {
    return `trace-${Date.now()}-${uuidv4()}`;
  }

  /**
   * Create trace context for one request or tick
   */
  createContext(tenantId: string, itemId?: string, existingTraceId?: string): TraceContext {
    return {
      traceId: existingTraceId || this.generateTraceId(),
      tenantId,
      itemId,
    };
  }
}
