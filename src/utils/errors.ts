export class RouterError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RouterError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends RouterError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class LLMError extends AdapterError {
  constructor(message: string, options?: ErrorOptions) {
    super('LLM', message, options);
    this.name = 'LLMError';
  }
}

/** Catalog documents (capability registry, product scope) that cannot be read or parsed. */
export class CatalogError extends RouterError {
  public readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, 'CATALOG_LOAD_FAILED', options);
    this.name = 'CatalogError';
    this.path = path;
  }
}

export class ConfigError extends RouterError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
