export class SyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

export class ConfigError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class InvalidTimeframeError extends SyncError {
  constructor(timeframe: string) {
    super(`Invalid timeframe "${timeframe}". Use 'day', 'week', or 'month'`, 'INVALID_TIMEFRAME', {
      timeframe,
    });
    this.name = 'InvalidTimeframeError';
  }
}

export class FetchError extends SyncError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: string,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', { ...details, status, body });
    this.name = 'FetchError';
  }
}

export class ResponseParseError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESPONSE_PARSE_ERROR', details);
    this.name = 'ResponseParseError';
  }
}

export class WriteError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'WRITE_ERROR', details);
    this.name = 'WriteError';
  }
}

export class MalformedDateError extends SyncError {
  constructor(input: string) {
    super(`Unrecognized date: "${input}"`, 'MALFORMED_DATE', { input });
    this.name = 'MalformedDateError';
  }
}
