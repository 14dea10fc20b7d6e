export class RelayError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends RelayError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class TelegramError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('TELEGRAM', message, options);
    this.name = 'TelegramError';
  }
}

/** Why a translation call failed, as far as the provider tells us. */
export type TranslationFailureKind = 'auth' | 'quota' | 'rate_limit' | 'network' | 'unknown';

export class TranslationError extends AdapterError {
  public readonly kind: TranslationFailureKind;

  constructor(kind: TranslationFailureKind, message: string, options?: ErrorOptions) {
    super('TRANSLATION', message, options);
    this.name = 'TranslationError';
    this.kind = kind;
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
