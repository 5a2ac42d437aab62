import type { Resettable } from "./types";

/**
 * Transaction-scoped value. The ledger resets every slot when a top-level
 * transaction ends, whether it committed or reverted.
 */
export class TransientSlot<T> implements Resettable {
  private value: T | undefined;

  get(): T | undefined {
    return this.value;
  }

  set(value: T): void {
    this.value = value;
  }

  reset(): void {
    this.value = undefined;
  }
}
