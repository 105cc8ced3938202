/**
 * Re-publishes toolbar DOM events on the bus so toolbar clicks and keyboard
 * input take the same path into the controller.
 */
import { type EventBus, Events } from "./event-bus";
import { isToolId } from "./tools";

function stringDetail(e: Event): string | null {
  return e instanceof CustomEvent && typeof e.detail === "string" ? e.detail : null;
}

/**
 * @returns a function that removes every listener it added
 */
export function bindToolbarEvents(toolbar: EventTarget, bus: EventBus): () => void {
  const handlers: Array<[string, (e: Event) => void]> = [
    ["tool-change", (e) => {
      const tool = stringDetail(e);
      if (tool !== null && isToolId(tool)) bus.emit(Events.TOOL_CHANGE, tool);
    }],
    ["color-change", (e) => {
      const hex = stringDetail(e);
      if (hex !== null) bus.emit(Events.PRIMARY_COLOR_CHANGE, hex);
    }],
    ["secondary-color-change", (e) => {
      const hex = stringDetail(e);
      if (hex !== null) bus.emit(Events.SECONDARY_COLOR_CHANGE, hex);
    }],
    ["undo", () => bus.emit(Events.UNDO, null)],
    ["redo", () => bus.emit(Events.REDO, null)],
    ["clear", () => bus.emit(Events.CLEAR, null)],
    ["save", () => bus.emit(Events.SAVE, null)],
  ];

  handlers.forEach(([name, handler]) => toolbar.addEventListener(name, handler));
  return () => {
    handlers.forEach(([name, handler]) => toolbar.removeEventListener(name, handler));
  };
}
