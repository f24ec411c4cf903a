/**
 * Queue of package names waiting to be resynced.
 *
 * Change detectors push names as edits arrive; the orchestrator drains the
 * queue on its own cadence. A name queued twice before a drain is synced once.
 */
export class ResyncQueue {
  private readonly names = new Set<string>();

  get size(): number {
    return this.names.size;
  }

  push(packageName: string): void {
    this.names.add(packageName);
  }

  pushAll(packageNames: Iterable<string>): void {
    for (const name of packageNames) {
      this.push(name);
    }
  }

  /** Remove and return every queued name in first-queued order. */
  drain(): string[] {
    const drained = Array.from(this.names);
    this.names.clear();
    return drained;
  }

  has(packageName: string): boolean {
    return this.names.has(packageName);
  }
}
