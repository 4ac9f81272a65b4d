/**
 * Error taxonomy for the pipeline.
 *
 * Ingress errors are returned to the CRM sender synchronously and carry
 * the HTTP status the route replies with. Processing errors never leave
 * the worker: they are retried and then dead-lettered.
 */
export abstract class PipelineError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class WebhookAuthenticationError extends PipelineError {
  readonly statusCode = 401;
}

export class MalformedPayloadError extends PipelineError {
  readonly statusCode = 400;

  constructor(message: string, readonly issues: readonly unknown[] = [], options?: ErrorOptions) {
    super(message, options);
  }
}

export class QueueCapacityExceededError extends PipelineError {
  readonly statusCode = 503;
}

export class IngressProcessingError extends PipelineError {
  readonly statusCode = 500;
}

export class WebhookNotFoundError extends PipelineError {
  readonly statusCode = 404;

  constructor(readonly webhookName: string) {
    super(`Webhook ${webhookName} not found`);
  }
}

export class RemoteRegistrationError extends PipelineError {
  readonly statusCode = 502;
}

export class ConfigManagerNotInitializedError extends PipelineError {
  readonly statusCode = 500;

  constructor() {
    super('Webhook config not initialized');
  }
}

export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'RetryExhaustedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
