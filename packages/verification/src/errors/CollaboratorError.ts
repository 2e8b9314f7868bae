import { ApplicationError } from './ApplicationError';

/**
 * A PIN-delivery or profile service call failed: unreachable, non-2xx,
 * or a response body of the wrong shape.
 */
export class CollaboratorError extends ApplicationError {
  constructor(
    message: string,
    readonly status?: number,
    readonly payload?: unknown,
    options?: ErrorOptions
  ) {
    super(message, 'collaborator_error', options);
    this.name = 'CollaboratorError';
  }
}
