export class ApplicationError extends Error {
  constructor(
    message: string,
    readonly code: string = 'application_error',
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ApplicationError';
  }
}
