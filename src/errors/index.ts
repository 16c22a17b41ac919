/**
 * Barrel export for typed error hierarchy and error handler.
 */

export {
  Text2PageError,
  ConfigurationError,
  FontRegistrationError,
  ItemValidationError,
  BatchError,
  ItemTimeoutError,
} from './text2page-error.js';

export { ErrorHandler } from './error-handler.js';
export type { SerializedError } from './error-handler.js';
