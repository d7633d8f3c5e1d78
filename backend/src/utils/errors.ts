export interface ServiceErrorOptions {
  status?: number;
  code?: string;
  correlationId?: string;
  requestId?: string;
  body?: string;
  cause?: unknown;
}

/** Error raised by the Azure adapters, with the HTTP status and transport code. */
export class ServiceError extends Error {
  readonly status?: number;
  readonly code?: string;
  readonly correlationId?: string;
  readonly requestId?: string;
  readonly body?: string;

  constructor(message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ServiceError';
    this.status = options.status;
    this.code = options.code;
    this.correlationId = options.correlationId;
    this.requestId = options.requestId;
    this.body = options.body;
  }
}

export interface ErrorDetails {
  name: string;
  message: string;
  code?: string;
  status?: number;
}

function readStringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

function readNumberField(value: object, key: string): number | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

export function describeError(error: unknown): ErrorDetails {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      code: readStringField(error, 'code'),
      status: readNumberField(error, 'status')
    };
  }
  if (typeof error === 'object' && error !== null) {
    return {
      name: readStringField(error, 'name') ?? 'Error',
      message: readStringField(error, 'message') ?? Object.prototype.toString.call(error),
      code: readStringField(error, 'code'),
      status: readNumberField(error, 'status')
    };
  }
  return { name: 'Error', message: String(error) };
}
