export class ConfigurationError extends Error {
  constructor(
    readonly key: string,
    message: string,
  ) {
    super(`${key}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

export class EmbeddingUnavailableError extends Error {
  constructor(reason: string) {
    super(`embedding unavailable: ${reason}`);
    this.name = 'EmbeddingUnavailableError';
  }
}
