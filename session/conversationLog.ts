import type { ConversationEntry } from '../types';

/** Append-only record of what was asked and answered, kept for display. */
export class ConversationLog {
  private readonly items: ConversationEntry[] = [];

  append(label: string, answer: string): ConversationEntry {
    const entry = Object.freeze({ label, answer });
    this.items.push(entry);
    return entry;
  }

  entries(): readonly ConversationEntry[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}
