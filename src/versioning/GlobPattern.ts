/**
 * A path with wildcard holes.
 *
 * The pattern is kept as the literal text between wildcards rather than as a
 * glob string, so literal brackets and asterisks in real file names never turn
 * into glob syntax, and the text a wildcard matched can be read back out of a
 * result (used to recover frame numbers).
 */

const SEPARATOR_CHARS = new Set(['/', '\\']);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function literalToRegExp(literal: string): string {
  let out = '';
  for (const ch of literal) {
    out += SEPARATOR_CHARS.has(ch) ? '[\\\\/]' : escapeRegExp(ch);
  }
  return out;
}

function lastSeparatorIndex(text: string): number {
  return Math.max(text.lastIndexOf('/'), text.lastIndexOf('\\'));
}

export type LiteralEscaper = (literal: string) => string;

export class GlobPattern {
  private _matcher: RegExp | null = null;

  private constructor(
    /** Literal runs; a wildcard sits between each consecutive pair */
    readonly literals: readonly string[],
    /** When true only directories are candidates */
    readonly directoriesOnly: boolean,
  ) {}

  static fromPath(path: string): GlobPattern {
    return new GlobPattern([path], false);
  }

  get wildcardCount(): number {
    return this.literals.length - 1;
  }

  get isEmpty(): boolean {
    return this.literals.length === 1 && this.literals[0] === '';
  }

  /**
   * Replace every occurrence of `text` with a wildcard.
   */
  wildcardAll(text: string): GlobPattern {
    if (text === '') return this;
    const next = this.literals.flatMap((literal) => literal.split(text));
    return new GlobPattern(GlobPattern.mergeAdjacent(next), this.directoriesOnly);
  }

  /**
   * Replace only the last occurrence of `text` with a wildcard.
   */
  wildcardLast(text: string): GlobPattern {
    if (text === '') return this;
    for (let i = this.literals.length - 1; i >= 0; i--) {
      const literal = this.literals[i] ?? '';
      const idx = literal.lastIndexOf(text);
      if (idx === -1) continue;
      const next = [
        ...this.literals.slice(0, i),
        literal.slice(0, idx),
        literal.slice(idx + text.length),
        ...this.literals.slice(i + 1),
      ];
      return new GlobPattern(GlobPattern.mergeAdjacent(next), this.directoriesOnly);
    }
    return this;
  }

  /**
   * Drop the final path segment, wildcards included, and match directories only.
   * With W standing for a wildcard, `/show/W/sh010_W.W.exr` becomes `/show/W`.
   */
  parentDirectory(): GlobPattern {
    for (let i = this.literals.length - 1; i >= 0; i--) {
      const literal = this.literals[i] ?? '';
      const idx = lastSeparatorIndex(literal);
      if (idx === -1) continue;
      return new GlobPattern([...this.literals.slice(0, i), literal.slice(0, idx)], true);
    }
    return new GlobPattern([''], true);
  }

  /**
   * Render as a glob string, escaping each literal with `escape`.
   */
  toGlob(escape: LiteralEscaper): string {
    return this.literals.map(escape).join('*');
  }

  /**
   * Text matched by each wildcard, or null when `candidate` does not fit the pattern.
   * Wildcards never cross a path separator; either separator matches either kind.
   */
  matchWildcards(candidate: string): string[] | null {
    if (!this._matcher) {
      const source = this.literals.map(literalToRegExp).join('([^\\\\/]*)');
      this._matcher = new RegExp(`^${source}$`);
    }
    const match = this._matcher.exec(candidate);
    return match ? match.slice(1) : null;
  }

  toString(): string {
    return this.literals.join('*');
  }

  // Two wildcards with nothing between them are one wildcard
  private static mergeAdjacent(literals: string[]): string[] {
    return literals.filter((literal, i) => literal !== '' || i === 0 || i === literals.length - 1);
  }
}
