/**
 * Resolution Log for tracking every value the resolver infers
 */

export type ResolutionEventType =
  | "TABLE_DERIVED"
  | "KEY_INFERRED"
  | "FIELD_SYNTHESIZED"
  | "PIVOT_CREATED"
  | "PIVOT_REUSED"
  | "ORDER_COMPUTED";

export interface ResolutionEvent {
  eventType: ResolutionEventType;
  entity?: string;
  pivot?: string;
  detail: string;
  timestamp: number;
}

export type ResolutionEventSink = (event: ResolutionEvent) => void;

export class ResolutionLog {
  private events: ResolutionEvent[] = [];

  constructor(private sink?: ResolutionEventSink) {}

  log(event: Omit<ResolutionEvent, "timestamp">): void {
    const recorded: ResolutionEvent = { ...event, timestamp: Date.now() };
    this.events.push(recorded);
    this.sink?.(recorded);
  }

  hasEvent(eventType: ResolutionEventType): boolean {
    return this.events.some((e) => e.eventType === eventType);
  }

  eventsOfType(eventType: ResolutionEventType): ResolutionEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  getAllEvents(): ResolutionEvent[] {
    return [...this.events];
  }

  clear(): void {
    this.events = [];
  }

  tableDerived(entity: string, table: string): void {
    this.log({
      eventType: "TABLE_DERIVED",
      entity,
      detail: `storage name "${table}" derived from "${entity}"`,
    });
  }

  keyInferred(entity: string, relationship: string, key: string): void {
    this.log({
      eventType: "KEY_INFERRED",
      entity,
      detail: `${relationship}: key "${key}" inferred`,
    });
  }

  fieldSynthesized(entity: string, field: string, reason: string): void {
    this.log({
      eventType: "FIELD_SYNTHESIZED",
      entity,
      detail: `column "${field}" added for ${reason}`,
    });
  }

  pivotCreated(pivot: string, reason: string): void {
    this.log({ eventType: "PIVOT_CREATED", pivot, detail: reason });
  }

  pivotReused(pivot: string, relationship: string): void {
    this.log({
      eventType: "PIVOT_REUSED",
      pivot,
      detail: `${relationship} joined existing pivot`,
    });
  }

  orderComputed(order: string[]): void {
    this.log({ eventType: "ORDER_COMPUTED", detail: order.join(" → ") });
  }
}
