import type { StarToken } from '../lexer';

/**
 * One-token look-ahead over a lazy token source. Comment tokens never reach
 * the caller; they are handed to `onComment` as they go past.
 */
export class TokenStream {
  private buffered?: StarToken;
  private last?: StarToken;
  private exhausted = false;

  constructor(
    private readonly source: Iterator<StarToken>,
    private readonly onComment?: (token: StarToken) => void
  ) {}

  peek(): StarToken | undefined {
    if (this.buffered === undefined) this.buffered = this.pull();
    return this.buffered;
  }

  next(): StarToken | undefined {
    const token = this.peek();
    this.buffered = undefined;
    if (token) this.last = token;
    return token;
  }

  /** The most recent token returned by `next`. */
  previous(): StarToken | undefined {
    return this.last;
  }

  private pull(): StarToken | undefined {
    while (!this.exhausted) {
      const result = this.source.next();
      if (result.done) {
        this.exhausted = true;
        break;
      }
      if (result.value.kind === 'comment') {
        this.onComment?.(result.value);
        continue;
      }
      return result.value;
    }
    return undefined;
  }
}
