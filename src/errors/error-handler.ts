/**
 * Error Handler
 *
 * Converts thrown values to user-facing messages and moves them across
 * process boundaries.
 */

import {
  Text2PageError,
  ConfigurationError,
  FontRegistrationError,
  ItemValidationError,
  BatchError,
  ItemTimeoutError,
} from './text2page-error.js';

export { Text2PageError } from './text2page-error.js';

/** Plain-object form of an error, safe to send over IPC or write as JSON. */
export interface SerializedError {
  name: string;
  code: string;
  message: string;
  context?: Record<string, unknown>;
  timeoutMs?: number;
}

export class ErrorHandler {
  /**
   * Convert any thrown value to a friendly user-facing message.
   */
  static toUserMessage(err: unknown): string {
    if (err instanceof ConfigurationError) {
      return `Configuration problem: ${err.message}`;
    }
    if (err instanceof ItemTimeoutError) {
      return `${err.message} (limit ${Math.ceil(err.timeoutMs / 1000)}s)`;
    }
    if (err instanceof Text2PageError) {
      return `${err.message} (${err.code})`;
    }
    if (err instanceof Error) {
      return err.message;
    }
    return 'An unexpected error occurred.';
  }

  static serialize(err: unknown): SerializedError {
    if (err instanceof ItemTimeoutError) {
      return {
        name: err.name,
        code: err.code,
        message: err.message,
        context: err.context,
        timeoutMs: err.timeoutMs,
      };
    }
    if (err instanceof Text2PageError) {
      return { name: err.name, code: err.code, message: err.message, context: err.context };
    }
    if (err instanceof Error) {
      return { name: err.name, code: 'UNKNOWN_ERROR', message: err.message };
    }
    return { name: 'Error', code: 'UNKNOWN_ERROR', message: String(err) };
  }

  /**
   * Rebuild the typed error a worker process serialized.
   */
  static revive(data: SerializedError): Text2PageError {
    switch (data.code) {
      case 'CONFIG_ERROR':
        return new ConfigurationError(data.message, data.context);
      case 'FONT_ERROR':
        return new FontRegistrationError(data.message, data.context);
      case 'ITEM_INVALID':
        return new ItemValidationError(data.message, data.context);
      case 'BATCH_ERROR':
        return new BatchError(data.message, data.context);
      case 'ITEM_TIMEOUT':
        return new ItemTimeoutError(data.message, data.timeoutMs ?? 0, data.context);
      default:
        return new Text2PageError(data.message, data.code, data.context);
    }
  }
}
