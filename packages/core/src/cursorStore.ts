export interface FileCursor {
  /** Bytes consumed so far. */
  offset: number;
  /** Physical lines consumed so far, blank and malformed lines included. */
  lineNo: number;
}

const EMPTY_CURSOR: FileCursor = { offset: 0, lineNo: 0 };

export class CursorStore {
  private readonly cursors = new Map<string, FileCursor>();

  get(filePath: string): FileCursor {
    const cursor = this.cursors.get(filePath);
    return { ...(cursor ?? EMPTY_CURSOR) };
  }

  has(filePath: string): boolean {
    return this.cursors.has(filePath);
  }

  set(filePath: string, cursor: FileCursor): void {
    this.cursors.set(filePath, { ...cursor });
  }

  reset(filePath: string): void {
    this.cursors.set(filePath, { ...EMPTY_CURSOR });
  }

  delete(filePath: string): void {
    this.cursors.delete(filePath);
  }

  clear(): void {
    this.cursors.clear();
  }

  get size(): number {
    return this.cursors.size;
  }
}
