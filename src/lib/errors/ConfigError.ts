import { AppError } from './AppError';

/** Raised at startup when the environment cannot produce a usable config. */
export class ConfigError extends AppError {
  constructor(
    message: string,
    readonly variable?: string,
  ) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}
