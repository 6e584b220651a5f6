export class SheetWriteException extends Error {
  constructor(
    public readonly ranges: string[],
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${ranges.length} cell(s): ${reason}`, { cause });
    this.name = 'SheetWriteException';
  }
}
