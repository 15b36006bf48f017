// Errors raised for checked geometric preconditions

export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly argument: string,
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
