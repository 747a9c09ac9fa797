import type { CanonicalMessage } from "../messages/types.js";

/**
 * The canonical, append-only message log of one conversation.
 * truncate() is reserved for validated rewinds and clears.
 */
export class MessageLog {
  private items: CanonicalMessage[] = [];

  get length(): number {
    return this.items.length;
  }

  /** Appends and returns the message's canonical index. */
  append(message: CanonicalMessage): number {
    this.items.push(Object.freeze({ ...message }));
    return this.items.length - 1;
  }

  at(index: number): CanonicalMessage | undefined {
    return this.items[index];
  }

  all(): readonly CanonicalMessage[] {
    return this.items;
  }

  slice(start: number, end?: number): CanonicalMessage[] {
    return this.items.slice(start, end);
  }

  /** Swaps in a shorter array; arrays handed out by all() keep their contents. */
  truncate(length: number): void {
    this.items = this.items.slice(0, Math.max(0, length));
  }

  replace(messages: readonly CanonicalMessage[]): void {
    this.items = [];
    for (const m of messages) this.append(m);
  }
}
