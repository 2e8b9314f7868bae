import { ApplicationError } from './ApplicationError';

export class ConfigError extends ApplicationError {
  constructor(readonly issues: ReadonlyArray<string>) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'config_error');
    this.name = 'ConfigError';
  }
}
