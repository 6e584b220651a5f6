export class UsageException extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageException';
  }
}
