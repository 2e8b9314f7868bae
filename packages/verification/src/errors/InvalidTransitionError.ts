import { ApplicationError } from './ApplicationError';

export class InvalidTransitionError extends ApplicationError {
  constructor(
    readonly from: string,
    readonly to: string
  ) {
    super(`Invalid flow transition ${from} -> ${to}`, 'invalid_transition');
    this.name = 'InvalidTransitionError';
  }
}
