/**
 * Event Bus
 *
 * A simple publish-subscribe pattern for decoupling components.
 * Input sources and the toolbar emit; the app forwards to the controller.
 */
import type { ToolId } from "./tools";
import type { PointerSample } from "./types";

// Event name constants for type safety
export const Events = {
  // Pointer samples in canvas-local coordinates
  POINTER: "pointer:sample",

  // Tool/color changes
  TOOL_CHANGE: "tool:change",
  PRIMARY_COLOR_CHANGE: "color:primary",
  SECONDARY_COLOR_CHANGE: "color:secondary",

  // History events
  UNDO: "history:undo",
  REDO: "history:redo",

  // Canvas actions
  CLEAR: "canvas:clear",
  SAVE: "canvas:save",
} as const;

// Type for event names
export type EventName = (typeof Events)[keyof typeof Events];

/**
 * Payload carried by each event
 */
export interface EventPayloads {
  "pointer:sample": PointerSample;
  "tool:change": ToolId;
  "color:primary": string;
  "color:secondary": string;
  "history:undo": null;
  "history:redo": null;
  "canvas:clear": null;
  "canvas:save": null;
}

type Handler<T = unknown> = (data: T) => void;

export class EventBus {
  private handlers = new Map<EventName, Set<Handler>>();

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<E extends EventName>(event: E, handler: Handler<EventPayloads[E]>): () => void {
    let set = this.handlers.get(event);
    if (!set) {
      set = new Set();
      this.handlers.set(event, set);
    }
    set.add(handler as Handler);
    return () => {
      this.handlers.get(event)?.delete(handler as Handler);
    };
  }

  /**
   * Emit an event with data
   */
  emit<E extends EventName>(event: E, data: EventPayloads[E]): void {
    this.handlers.get(event)?.forEach((h) => h(data));
  }

  /**
   * Remove all handlers for an event
   */
  off(event: EventName): void {
    this.handlers.delete(event);
  }

  /**
   * Remove all handlers for all events
   */
  clear(): void {
    this.handlers.clear();
  }
}

// Singleton instance
export const bus = new EventBus();
