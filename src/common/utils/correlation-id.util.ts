import { IncomingHttpHeaders } from 'http';
import { v4 as uuidv4 } from 'uuid';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

export class CorrelationIdUtil {
  static generate(): string {
    return uuidv4();
  }

  static extract(headers: IncomingHttpHeaders): string | undefined {
    const value = headers['x-correlation-id'] ?? headers['correlation-id'];
    const id = Array.isArray(value) ? value[0] : value;
    return id?.trim() || undefined;
  }

  static getOrGenerate(headers: IncomingHttpHeaders): string {
    return this.extract(headers) || this.generate();
  }

  /** Correlation id stored on `res.locals` by the logging middleware */
  static fromLocals(locals: Record<string, unknown>): string | undefined {
    const value = locals.correlationId;
    return typeof value === 'string' ? value : undefined;
  }
}
