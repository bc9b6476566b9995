/**
 * Raised by the draw engine when its inputs break the contract.
 * Signals a programming error upstream, so callers should not recover from it.
 */
export class DrawPreconditionError extends Error {
  constructor(
    message: string,
    public readonly problems: readonly string[] = [],
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'DrawPreconditionError';
  }
}
