/**
 * packages/core/src/modules/stateCell.ts — Per-module published state.
 *
 * The only shared state between a module and its background tasks. A task
 * publishes a complete value in one assignment, so readers observe either the
 * previous value or the new one. Overlapping tasks resolve last-writer-wins:
 * whichever finishes last is what update() reads on the next frame.
 */

export type Published<T> = Readonly<{
  value: T;
  /** Incremented on every publish; 0 means "initial value". */
  version: number;
}>;

export class ModuleStateCell<T> {
  private current: Published<T>;
  private inFlight = 0;

  constructor(initial: T) {
    this.current = Object.freeze({ value: initial, version: 0 });
  }

  read(): T {
    return this.current.value;
  }

  snapshot(): Published<T> {
    return this.current;
  }

  get version(): number {
    return this.current.version;
  }

  /** True while at least one background task for this cell has not settled. */
  get refreshing(): boolean {
    return this.inFlight > 0;
  }

  publish(value: T): number {
    const version = this.current.version + 1;
    this.current = Object.freeze({ value, version });
    return version;
  }

  /** Bookkeeping for background tasks; pair every call with taskSettled(). */
  taskStarted(): void {
    this.inFlight++;
  }

  taskSettled(): void {
    if (this.inFlight > 0) this.inFlight--;
  }
}
