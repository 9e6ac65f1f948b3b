import { looseKey } from '@brewsheet/shared';

/**
 * Column name → zero-based position within one table. Names are trimmed once,
 * when the index is built; lookups are exact and case-sensitive. A repeated
 * header keeps the position of its first occurrence.
 */
export class ColumnIndex {
  private readonly positions = new Map<string, number>();
  private readonly labels: string[] = [];

  constructor(headerNames: readonly string[]) {
    for (const raw of headerNames) {
      this.register(raw.trim());
    }
  }

  get size(): number {
    return this.labels.length;
  }

  get names(): readonly string[] {
    return this.labels;
  }

  resolve(name: string): number | undefined {
    return this.positions.get(name);
  }

  /** Record a column appended after the last known one; returns its position */
  register(name: string): number {
    const position = this.labels.length;
    this.labels.push(name);
    if (!this.positions.has(name)) {
      this.positions.set(name, position);
    }
    return position;
  }

  /** A known name equal to `name` once case and outer whitespace are ignored */
  nearMatch(name: string): string | undefined {
    const key = looseKey(name);
    return this.labels.find((label) => looseKey(label) === key);
  }

  /** Diagnostic text for a failed lookup */
  describeMiss(name: string, source: string): string {
    const known = this.labels.map((label) => `'${label}'`).join(' ');
    let message = `Cannot find column named '${name}' in table ${source}.\nValid columns are... ${known}`;
    if (this.nearMatch(name) !== undefined) {
      message += '\n(Check capitalization and whitespace)';
    }
    return message;
  }
}
