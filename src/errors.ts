export class BotError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A `/forecast` argument that failed validation; the message is shown to the user as is. */
export class InputError extends BotError {
  constructor(
    public readonly field: string,
    public readonly value: string | undefined,
    message: string,
  ) {
    super(message);
  }
}

export class ProviderError extends BotError {}

export class ConfigError extends BotError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}
