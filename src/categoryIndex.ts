export type CategoryEntry = readonly [label: string, fileName: string];

/**
 * Ordered association between category labels and the page files that
 * hold them.
 */
export class CategoryIndex {
  private readonly entries = new Map<string, string>();

  constructor(entries: Iterable<readonly [string, string]> = []) {
    for (const [label, fileName] of entries) {
      this.set(label, fileName);
    }
  }

  set(label: string, fileName: string): void {
    this.entries.set(label, fileName);
  }

  fileFor(label: string): string | undefined {
    return this.entries.get(label);
  }

  /**
   * First category (in insertion order) whose page is fileName
   */
  labelFor(fileName: string): string | undefined {
    for (const [label, file] of this.entries) {
      if (file === fileName) return label;
    }
    return undefined;
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries.entries();
  }

  /**
   * [label, fileName] pairs in insertion order. Templates get these rather
   * than an object, whose integer-like keys would sort ahead of the rest.
   */
  toEntries(): CategoryEntry[] {
    return Array.from(this.entries, ([label, fileName]): CategoryEntry => Object.freeze([label, fileName] as const));
  }
}
