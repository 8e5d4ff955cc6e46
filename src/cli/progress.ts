import type { BusEvent, EventHandler } from "../core/event-bus.js";

export function formatProgressLine(event: BusEvent): string {
  const payload = Object.keys(event.payload).length > 0 ? ` ${JSON.stringify(event.payload)}` : "";
  return `[${event.spanId}] ${event.type}${payload}`;
}

export function createProgressPrinter(write: (line: string) => void = console.log): EventHandler {
  return (event) => {
    write(formatProgressLine(event));
  };
}
