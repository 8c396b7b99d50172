/** Thrown when the workflow configuration cannot be loaded. Lists every offending setting. */
export class ConfigurationError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}
