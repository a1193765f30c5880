export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message} ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

export class InvalidSignalError extends Error {
  constructor(
    message: string,
    public readonly signalName: string,
    public readonly value: number
  ) {
    super(message);
    this.name = "InvalidSignalError";
  }
}
