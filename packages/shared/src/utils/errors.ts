export class HostPulseError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HostPulseError';
    this.code = code;
  }
}

/** A single sub-metric could not be read. Logged; never aborts a snapshot. */
export class CollectionError extends HostPulseError {
  public readonly section: string;

  constructor(section: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(`Failed to collect ${section} metrics: ${detail}`, 'COLLECTION_ERROR', { cause });
    this.name = 'CollectionError';
    this.section = section;
  }
}

export class DeliveryError extends HostPulseError {
  public readonly status?: number;
  public readonly retryable: boolean;

  constructor(message: string, options: { status?: number; retryable: boolean; cause?: unknown }) {
    super(message, 'DELIVERY_ERROR', { cause: options.cause });
    this.name = 'DeliveryError';
    this.status = options.status;
    this.retryable = options.retryable;
  }
}

export class ValidationError extends HostPulseError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Snapshot validation failed: ${issues.join('; ')}`, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.issues = issues;
  }

  get reason(): string {
    return this.issues.join('; ');
  }
}

export class StorageError extends HostPulseError {
  public readonly backend: string;

  constructor(backend: string, message: string, cause?: unknown) {
    super(`[${backend}] ${message}`, 'STORAGE_ERROR', { cause });
    this.name = 'StorageError';
    this.backend = backend;
  }
}

export class ChannelError extends HostPulseError {
  public readonly channel: string;

  constructor(channel: string, message: string, cause?: unknown) {
    super(`Channel "${channel}" failed: ${message}`, 'CHANNEL_ERROR', { cause });
    this.name = 'ChannelError';
    this.channel = channel;
  }
}

export class ConfigValidationError extends HostPulseError {
  public readonly errors: string[];

  constructor(errors: string[], source?: string) {
    const where = source ? ` (${source})` : '';
    super(`Configuration validation failed${where}:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export class ConfigLoadError extends HostPulseError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_LOAD_ERROR', { cause });
    this.name = 'ConfigLoadError';
  }
}

export class ServiceUnavailableError extends HostPulseError {
  constructor(message: string = 'Ingestion service is shutting down') {
    super(message, 'SERVICE_UNAVAILABLE');
    this.name = 'ServiceUnavailableError';
  }
}
