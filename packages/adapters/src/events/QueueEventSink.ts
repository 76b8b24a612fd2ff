// ============================================
// BullMQ Event Sink
// ============================================

import { createLogger, type EngineEventJob } from "@pegmint/common";
import type { EngineEvent, EventSink } from "@pegmint/engine";

const logger = createLogger("adapters:events");

/** The part of a BullMQ `Queue` the sink uses. */
export interface EventQueue {
  readonly name: string;
  add(name: string, data: EngineEventJob): Promise<unknown>;
}

/** Convert an engine event to its JSON-safe job payload. */
export function toEventJob(event: EngineEvent, timestamp: Date): EngineEventJob {
  const at = timestamp.toISOString();
  switch (event.type) {
    case "collateral_deposited":
      return { ...event, amount: event.amount.toString(), timestamp: at };
    case "collateral_redeemed":
      return { ...event, amount: event.amount.toString(), timestamp: at };
    case "debt_minted":
      return { ...event, amount: event.amount.toString(), timestamp: at };
    case "debt_burned":
      return { ...event, amount: event.amount.toString(), timestamp: at };
    case "account_liquidated":
      return {
        ...event,
        debtCovered: event.debtCovered.toString(),
        collateralSeized: event.collateralSeized.toString(),
        timestamp: at,
      };
  }
}

export class QueueEventSink implements EventSink {
  constructor(
    private readonly queue: EventQueue,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async publish(events: readonly EngineEvent[]): Promise<void> {
    const timestamp = this.clock();
    for (const event of events) {
      await this.queue.add(event.type, toEventJob(event, timestamp));
    }
    logger.debug(`Queued ${events.length} events`, { queue: this.queue.name });
  }
}
