import { generateCallbackId } from "@hookloop/shared";

/** Result of handing a payload to a registration. */
export type DeliveryOutcome = "settled" | "partial";

/**
 * One entry of the registry.
 *
 * One-shot registrations are removed as soon as `deliver` reports
 * `"settled"`. Persistent ones stay until explicitly deleted.
 */
export interface Registration {
  readonly persistent: boolean;
  deliver(payload: unknown): DeliveryOutcome;
  /** Called when the registry is torn down while the entry is still present. */
  abandon?(callbackId: string): void;
}

/**
 * Callback id → registration map.
 *
 * Owned by a single scheduler. Ids are unique among the entries currently
 * present; an id is drawn again if it collides.
 */
export class CallbackRegistry {
  private readonly entries = new Map<string, Registration>();

  /** Draw an id not used by any present entry. */
  allocateId(prefix: string): string {
    let id = generateCallbackId(prefix);
    while (this.entries.has(id)) {
      id = generateCallbackId(prefix);
    }
    return id;
  }

  register(prefix: string, registration: Registration): string {
    const id = this.allocateId(prefix);
    this.entries.set(id, registration);
    return id;
  }

  set(callbackId: string, registration: Registration): void {
    this.entries.set(callbackId, registration);
  }

  get(callbackId: string): Registration | undefined {
    return this.entries.get(callbackId);
  }

  has(callbackId: string): boolean {
    return this.entries.has(callbackId);
  }

  delete(callbackId: string): boolean {
    return this.entries.delete(callbackId);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Remove every entry, returning what was removed. */
  clear(): Array<[string, Registration]> {
    const removed = [...this.entries];
    this.entries.clear();
    return removed;
  }
}
