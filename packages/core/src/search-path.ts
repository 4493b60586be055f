/**
 * An ordered, immutable list of directories searched for executables.
 * Every change returns a new instance; nothing here touches process.env.
 */
export class SearchPath {
  readonly entries: readonly string[]
  readonly delimiter: string

  constructor(entries: readonly string[], delimiter: string) {
    this.entries = [...entries]
    this.delimiter = delimiter
  }

  // Empty entries are kept: on POSIX they stand for the current directory.
  // An empty or missing value has no entries at all.
  static parse(value: string | undefined, delimiter: string): SearchPath {
    return new SearchPath(value ? value.split(delimiter) : [], delimiter)
  }

  prepend(dir: string): SearchPath {
    return new SearchPath([dir, ...this.entries], this.delimiter)
  }

  append(dir: string): SearchPath {
    return new SearchPath([...this.entries, dir], this.delimiter)
  }

  toString(): string {
    return this.entries.join(this.delimiter)
  }
}
