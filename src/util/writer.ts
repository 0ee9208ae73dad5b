/// \file writer.ts
/// \brief Text sink for OrderedMap.printRaw dumps

/** Destination for diagnostic text. */
export interface Writer {
  write(s: string): void;
}

/** Collects dump output in memory; `toString()` returns everything written. */
export class StringWriter implements Writer {
  private parts: string[] = [];

  write(s: string): void {
    this.parts.push(s);
  }

  toString(): string {
    return this.parts.join('');
  }

  /** Drop collected output so the writer can take another dump. */
  clear(): void {
    this.parts.length = 0;
  }
}
