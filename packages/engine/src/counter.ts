/**
 * Messages stored and acknowledged during one run, shared by its tasks.
 * Increments happen between awaits, so no lock is needed.
 */
export class ProcessedCounter {
  private count = 0;

  add(n: number): void {
    this.count += n;
  }

  get value(): number {
    return this.count;
  }
}
