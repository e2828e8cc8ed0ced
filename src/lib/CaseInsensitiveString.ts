/**
 * Case-insensitive string value
 *
 * Keeps the original text and a lower-cased copy computed once. Every query
 * lower-cases its operand and runs against the cached copy, so callers can
 * pass plain strings in any case.
 */

export type FoldOperand = string | CaseInsensitiveString;

export class CaseInsensitiveString {
  private readonly original: string;
  private readonly folded: string;

  constructor(value: string) {
    this.original = value;
    this.folded = value.toLowerCase();
  }

  get length(): number {
    return this.original.length;
  }

  /**
   * The cached lower-cased form
   */
  lower(): string {
    return this.folded;
  }

  /**
   * Key for Map/Set lookups; equal values share a key
   */
  hashKey(): string {
    return this.folded;
  }

  toString(): string {
    return this.original;
  }

  equalsFold(other: FoldOperand): boolean {
    return this.folded === fold(other);
  }

  notEqualsFold(other: FoldOperand): boolean {
    return !this.equalsFold(other);
  }

  /**
   * Code-unit order of the lower-cased forms
   */
  compareFold(other: FoldOperand): -1 | 0 | 1 {
    const right = fold(other);
    if (this.folded < right) {
      return -1;
    }
    return this.folded > right ? 1 : 0;
  }

  lessThan(other: FoldOperand): boolean {
    return this.compareFold(other) < 0;
  }

  lessThanOrEqual(other: FoldOperand): boolean {
    return this.compareFold(other) <= 0;
  }

  greaterThan(other: FoldOperand): boolean {
    return this.compareFold(other) > 0;
  }

  greaterThanOrEqual(other: FoldOperand): boolean {
    return this.compareFold(other) >= 0;
  }

  containsFold(sub: FoldOperand): boolean {
    return this.folded.includes(fold(sub));
  }

  /**
   * Number of non-overlapping occurrences inside [start, end)
   */
  countFold(sub: FoldOperand, start?: number, end?: number): number {
    const range = this.window(start, end);
    if (!range) {
      return 0;
    }

    const needle = fold(sub);
    const haystack = this.folded.slice(range.start, range.end);
    if (needle.length === 0) {
      return haystack.length + 1;
    }

    let count = 0;
    let position = haystack.indexOf(needle);
    while (position !== -1) {
      count++;
      position = haystack.indexOf(needle, position + needle.length);
    }
    return count;
  }

  /**
   * Lowest index of `sub` inside [start, end), or -1
   */
  findFold(sub: FoldOperand, start?: number, end?: number): number {
    const range = this.window(start, end);
    if (!range) {
      return -1;
    }

    return this.folded.slice(0, range.end).indexOf(fold(sub), range.start);
  }

  /**
   * Highest index of `sub` inside [start, end), or -1
   */
  rfindFold(sub: FoldOperand, start?: number, end?: number): number {
    const range = this.window(start, end);
    if (!range) {
      return -1;
    }

    const needle = fold(sub);
    const index = this.folded.slice(0, range.end).lastIndexOf(needle);
    return index >= range.start ? index : -1;
  }

  /**
   * Like findFold but throws a RangeError when `sub` is absent
   */
  indexFold(sub: FoldOperand, start?: number, end?: number): number {
    const index = this.findFold(sub, start, end);
    if (index === -1) {
      throw new RangeError(`Substring not found: ${String(sub)}`);
    }
    return index;
  }

  /**
   * Like rfindFold but throws a RangeError when `sub` is absent
   */
  rindexFold(sub: FoldOperand, start?: number, end?: number): number {
    const index = this.rfindFold(sub, start, end);
    if (index === -1) {
      throw new RangeError(`Substring not found: ${String(sub)}`);
    }
    return index;
  }

  startsWithFold(prefix: FoldOperand, start?: number, end?: number): boolean {
    const range = this.window(start, end);
    if (!range) {
      return false;
    }
    return this.folded.slice(range.start, range.end).startsWith(fold(prefix));
  }

  endsWithFold(suffix: FoldOperand, start?: number, end?: number): boolean {
    const range = this.window(start, end);
    if (!range) {
      return false;
    }
    return this.folded.slice(range.start, range.end).endsWith(fold(suffix));
  }

  /**
   * Normalize slice bounds; negative values count from the end. Returns
   * null when the window starts past the end of the string or past its own
   * end bound.
   */
  private window(
    start?: number,
    end?: number
  ): { start: number; end: number } | null {
    const size = this.folded.length;
    const from = clamp(start ?? 0, size);
    const to = clamp(end ?? size, size);

    if (from > size || from > to) {
      return null;
    }
    return { start: from, end: to };
  }
}

function fold(value: FoldOperand): string {
  return typeof value === "string" ? value.toLowerCase() : value.lower();
}

function clamp(index: number, size: number): number {
  if (index < 0) {
    return Math.max(0, size + index);
  }
  return index;
}
