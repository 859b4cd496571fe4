/**
 * Errors raised by the collaborator clients
 */

export class ServiceError extends Error {
  readonly service: string;
  readonly status?: number;

  constructor(service: string, message: string, status?: number, options?: ErrorOptions) {
    super(`${service}: ${message}`, options);
    this.service = service;
    this.status = status;
    this.name = 'ServiceError';
  }
}

/**
 * Connection failure, timeout or 5xx response. Retried by ServiceClient.
 */
export class TransientNetworkError extends ServiceError {
  constructor(service: string, message: string, status?: number, options?: ErrorOptions) {
    super(service, message, status, options);
    this.name = 'TransientNetworkError';
  }
}

/**
 * The collaborator rejected the request or answered with something unusable.
 * Never retried.
 */
export class CollaboratorError extends ServiceError {
  constructor(service: string, message: string, status?: number, options?: ErrorOptions) {
    super(service, message, status, options);
    this.name = 'CollaboratorError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
