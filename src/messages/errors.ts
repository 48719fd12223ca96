export class MessageValidationError extends Error {
  constructor(
    message: string,
    public readonly messageType: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'MessageValidationError';
    Object.setPrototypeOf(this, MessageValidationError.prototype);
  }
}
