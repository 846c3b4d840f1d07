export const ERROR_BACKLOG_CAPACITY = 10;

/**
 * Most recent diagnostics of one invocation (unparsable lines, read faults).
 * Bounded so a chatty malformed stream cannot grow it without limit; the oldest
 * entry is dropped first.
 */
export class ErrorBacklog {
  private entries: string[] = [];

  constructor(private readonly capacity: number = ERROR_BACKLOG_CAPACITY) {}

  push(entry: string): void {
    this.entries.push(entry);
    while (this.entries.length > this.capacity) this.entries.shift();
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  toArray(): string[] {
    return [...this.entries];
  }

  join(separator = '\n'): string {
    return this.entries.join(separator);
  }
}
