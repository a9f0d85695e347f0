// error types the commands care about. a missing node is not one of them,
// probes just return null

export class UnauthorizedError extends Error {
  constructor(message: string = 'api token rejected by the dashboard') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

export class TransportError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
    this.body = options.body;
  }
}

export class RuntimeUnavailableError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'RuntimeUnavailableError';
  }
}
