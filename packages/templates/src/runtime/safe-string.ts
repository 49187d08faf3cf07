/**
 * SafeString marks text that is already escaped (or trusted) and must not be
 * escaped again when autoescaping is on.
 */
export class SafeString {
  private readonly string: string;

  /**
   * Creates a SafeString that bypasses HTML escaping.
   *
   * @example
   * ```typescript
   * const safe = new SafeString('<b>bold</b>');
   * // Renders as: <b>bold</b> (not escaped)
   * ```
   */
  constructor(string: string) {
    this.string = string;
  }

  get length(): number {
    return this.string.length;
  }

  /**
   * Returns the unescaped text.
   */
  toString(): string {
    return this.string;
  }

  /**
   * Alias for toString().
   */
  toHTML(): string {
    return this.string;
  }
}
