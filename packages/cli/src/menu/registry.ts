import type { MenuEntry } from "./types";

export class MenuRegistry {
  private entries = new Map<string, MenuEntry>();
  private aliases = new Map<string, string>();

  register(entry: MenuEntry): this {
    const key = entry.key.toLowerCase();
    if (this.isTaken(key)) {
      throw new Error(`Duplicate menu entry: ${entry.key}`);
    }
    for (const alias of entry.aliases ?? []) {
      if (this.isTaken(alias.toLowerCase()) || alias.toLowerCase() === key) {
        throw new Error(`Duplicate menu entry: ${alias}`);
      }
    }

    this.entries.set(key, entry);
    for (const alias of entry.aliases ?? []) {
      this.aliases.set(alias.toLowerCase(), key);
    }
    return this;
  }

  /** Look up by key or alias, ignoring case and surrounding whitespace */
  get(choice: string): MenuEntry | undefined {
    const name = choice.trim().toLowerCase();
    const resolved = this.aliases.get(name) ?? name;
    return this.entries.get(resolved);
  }

  /** Entries in registration order */
  list(): MenuEntry[] {
    return [...this.entries.values()];
  }

  /** Menu lines as shown to the user */
  render(): string[] {
    return this.list().map((entry) => `${entry.key}. ${entry.label}`);
  }

  private isTaken(name: string): boolean {
    return this.entries.has(name) || this.aliases.has(name);
  }
}
