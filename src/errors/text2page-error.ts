/**
 * Typed error hierarchy
 *
 * Structured error classes with machine-readable codes and optional context.
 */

export class Text2PageError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'Text2PageError';
    // Maintain proper prototype chain for instanceof checks in transpiled JS
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends Text2PageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class FontRegistrationError extends Text2PageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'FONT_ERROR', context);
    this.name = 'FontRegistrationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ItemValidationError extends Text2PageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ITEM_INVALID', context);
    this.name = 'ItemValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BatchError extends Text2PageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'BATCH_ERROR', context);
    this.name = 'BatchError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ItemTimeoutError extends Text2PageError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'ITEM_TIMEOUT', context);
    this.name = 'ItemTimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
