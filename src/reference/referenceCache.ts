import type { ReferenceTable } from "./parseReferenceTable";

/**
 * Session-scoped holder for the parsed reference table.
 *
 * The first `get()` starts the load; every caller until `invalidate()` shares
 * that one promise. A failed load is dropped so the next call fetches again.
 */
export class ReferenceCache {
  private pending: Promise<ReferenceTable> | null = null;
  private loads = 0;

  constructor(private readonly loader: () => Promise<ReferenceTable>) {}

  get(): Promise<ReferenceTable> {
    if (this.pending) return this.pending;

    this.loads += 1;
    const load = this.loader();
    this.pending = load;
    load.catch(() => {
      if (this.pending === load) this.pending = null;
    });
    return load;
  }

  invalidate(): void {
    this.pending = null;
  }

  get loadCount(): number {
    return this.loads;
  }

  get isPopulated(): boolean {
    return this.pending !== null;
  }
}
