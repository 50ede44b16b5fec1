/**
 * Initialize-once cell. The factory runs on the first read of `value`; a
 * factory that throws leaves the cell empty so the next read tries again.
 */
export class Lazy<T> {
  private readonly factory: () => T;
  private cell: { value: T } | undefined;

  constructor(factory: () => T) {
    this.factory = factory;
  }

  get isValueCreated(): boolean {
    return this.cell !== undefined;
  }

  get value(): T {
    if (!this.cell) {
      this.cell = { value: this.factory() };
    }
    return this.cell.value;
  }
}
