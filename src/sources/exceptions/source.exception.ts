export abstract class SourceException extends Error {
  protected constructor(
    message: string,
    name: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = name;
  }
}
