export class SheetReadException extends Error {
  constructor(
    public readonly range: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read ${range}: ${reason}`, { cause });
    this.name = 'SheetReadException';
  }
}
