// ============================================
// Settlement of external asset movements
// ============================================

import { createLogger, toError } from "@pegmint/common";
import { isEngineError } from "../errors.js";

const logger = createLogger("engine:settlement");

/**
 * One external asset movement. Pulls bring assets into custody and run first;
 * pushes send assets out and run after every pull succeeded.
 */
export interface Movement {
  phase: "pull" | "push";
  label: string;
  execute(): Promise<void>;
  /** Undo a movement that already executed. Absent when it cannot be undone. */
  compensate?(): Promise<void>;
}

export class Settlement {
  private movements: Movement[] = [];

  add(movement: Movement): void {
    this.movements.push(movement);
  }

  /** Movements in execution order. */
  plan(): Movement[] {
    return [
      ...this.movements.filter((m) => m.phase === "pull"),
      ...this.movements.filter((m) => m.phase === "push"),
    ];
  }

  /**
   * Execute every movement. On the first failure, executed movements are
   * compensated in reverse order and the failure is rethrown.
   */
  async settle(): Promise<void> {
    const done: Movement[] = [];
    for (const movement of this.plan()) {
      try {
        await movement.execute();
      } catch (err) {
        const failure = toError(err);
        await this.unwind(done, failure);
        throw failure;
      }
      done.push(movement);
    }
  }

  private async unwind(done: Movement[], failure: Error): Promise<void> {
    for (const movement of [...done].reverse()) {
      if (!movement.compensate) {
        logger.error(`Cannot compensate ${movement.label}`, { error: failure.message });
        continue;
      }
      try {
        await movement.compensate();
        logger.info(`Compensated ${movement.label}`);
      } catch (err) {
        const compensationError = toError(err);
        logger.error(`Compensation of ${movement.label} failed`, {
          error: compensationError.message,
          original: failure.message,
        });
        if (isEngineError(failure)) failure.compensationErrors.push(compensationError);
      }
    }
  }
}
