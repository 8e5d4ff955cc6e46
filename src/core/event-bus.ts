/**
 * EventBus keeps the run's append-only event log and fans events out to subscribers.
 * Purpose: one ordered, causally tagged audit trail shared by every scope and task.
 * Assumptions: subscribers register before emission starts; there is no unsubscribe.
 * Usage: await bus.emit("task.start", { task: "git_add" }, context).
 */

import type { ExecutionContext } from "./context.js";
import { formatErrorMessage } from "./error-format.js";
import type { JsonObject } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type BusEvent = Readonly<{
  type: string;
  timestamp: string;
  traceId: string;
  spanId: string;
  payload: Readonly<JsonObject>;
}>;

export type EventHandler = (event: BusEvent, context: ExecutionContext) => void | Promise<void>;

export type SubscriberFailureMode = "isolate" | "propagate";

export type SubscriberFailure = {
  event: BusEvent;
  error: unknown;
};

export type EventBusOptions = {
  now?: () => Date;
  subscriberFailures?: SubscriberFailureMode;
  onSubscriberError?: (failure: SubscriberFailure) => void;
};

type Subscription = {
  type: string;
  handler: EventHandler;
};

// Subscribing to this type receives every event.
export const ALL_EVENTS = "*";

// =============================================================================
// EVENT BUS
// =============================================================================

export class EventBus {
  private readonly log: BusEvent[] = [];
  private readonly subscriptions: Subscription[] = [];
  private readonly failures: SubscriberFailure[] = [];
  private readonly now: () => Date;
  private readonly failureMode: SubscriberFailureMode;
  private readonly onSubscriberError: (failure: SubscriberFailure) => void;

  constructor(options: EventBusOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.failureMode = options.subscriberFailures ?? "isolate";
    this.onSubscriberError = options.onSubscriberError ?? warnSubscriberFailure;
  }

  subscribe(type: string, handler: EventHandler): void {
    this.subscriptions.push({ type, handler });
  }

  async emit(type: string, payload: JsonObject, context: ExecutionContext): Promise<BusEvent> {
    const event: BusEvent = Object.freeze({
      type,
      timestamp: this.now().toISOString(),
      traceId: context.traceId,
      spanId: context.spanId,
      payload: deepFreeze(structuredClone(payload)),
    });

    // Append before fan-out so log order always matches emit call order.
    this.log.push(event);

    const handlers = this.subscriptions
      .filter((subscription) => subscription.type === type || subscription.type === ALL_EVENTS)
      .map((subscription) => subscription.handler);

    for (const handler of handlers) {
      try {
        await handler(event, context);
      } catch (error) {
        if (this.failureMode === "propagate") throw error;

        const failure = { event, error };
        this.failures.push(failure);
        this.onSubscriberError(failure);
      }
    }

    return event;
  }

  events(): readonly BusEvent[] {
    return [...this.log];
  }

  get eventCount(): number {
    return this.log.length;
  }

  subscriberFailures(): readonly SubscriberFailure[] {
    return [...this.failures];
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function warnSubscriberFailure(failure: SubscriberFailure): void {
  console.warn(
    `Warning: subscriber for ${failure.event.type} failed [span: ${failure.event.spanId}]: ${formatErrorMessage(failure.error)}`,
  );
}
