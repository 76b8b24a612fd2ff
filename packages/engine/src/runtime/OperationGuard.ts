// ============================================
// Operation Guard (serialization + re-entry rejection)
// ============================================

import { AsyncLocalStorage } from "node:async_hooks";
import { EngineError } from "../errors.js";

/**
 * Runs one engine operation at a time. Calls issued from inside a running
 * operation (token callbacks, hooks) are rejected; calls from elsewhere wait
 * their turn in arrival order.
 */
export class OperationGuard {
  private readonly context = new AsyncLocalStorage<string>();
  private tail: Promise<void> = Promise.resolve();

  async run<T>(operation: string, body: () => Promise<T>): Promise<T> {
    const outer = this.context.getStore();
    if (outer !== undefined) {
      throw new EngineError(
        "REENTRANT_CALL",
        `${operation} cannot start while ${outer} is in progress`,
        { operation, inProgress: outer }
      );
    }

    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);

    await previous;
    try {
      return await this.context.run(operation, body);
    } finally {
      release();
    }
  }
}
