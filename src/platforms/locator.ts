import type { DriverElement } from "./driver";

export type SelectorGroup = Record<string, string>;

export interface SelectorTable<G extends SelectorGroup> {
  version: string;
  primary: G;
  fallback: Partial<G>;
}

/**
 * Resolves a named field to its selectors, primary first. Call sites ask for
 * fields, never for raw selector strings, so a markup change means editing the
 * table in one place.
 */
export class ElementLocator<G extends SelectorGroup> {
  constructor(private readonly table: SelectorTable<G>) {}

  get version(): string {
    return this.table.version;
  }

  chain(field: keyof G & string): string[] {
    const primary: G[typeof field] = this.table.primary[field];
    const fallback = this.table.fallback[field];
    return fallback && fallback !== primary ? [primary, fallback] : [primary];
  }

  /** Every selector of the chain joined into one selector list. */
  any(field: keyof G & string): string {
    return this.chain(field).join(", ");
  }

  /** First selector of the chain that matches anything, evaluated synchronously (cheerio). */
  pick<T extends { length: number }>(field: keyof G & string, query: (selector: string) => T): T | null {
    for (const selector of this.chain(field)) {
      const matches = query(selector);
      if (matches.length > 0) return matches;
    }
    return null;
  }

  /** Same as pick, against a live driver scope. */
  async findAll(
    scope: { findAll(selector: string): Promise<DriverElement[]> },
    field: keyof G & string,
  ): Promise<DriverElement[]> {
    for (const selector of this.chain(field)) {
      const matches = await scope.findAll(selector);
      if (matches.length > 0) return matches;
    }
    return [];
  }

  async findFirst(
    scope: { findAll(selector: string): Promise<DriverElement[]> },
    field: keyof G & string,
  ): Promise<DriverElement | null> {
    const matches = await this.findAll(scope, field);
    return matches[0] ?? null;
  }
}
