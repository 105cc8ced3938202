/**
 * History Manager - Undo/Redo System
 *
 * Two stacks of shape references:
 * - committed: the source of truth, repainted every frame in order
 * - undone: the redo buffer
 *
 * A shape lives in exactly one of them. Any new push starts a fresh
 * branch, so the redo buffer is dropped.
 */
import { Store } from "./stores";
import type { Shape } from "./shapes";

/**
 * Observable state for UI components to subscribe to
 */
export interface HistoryState {
  canUndo: boolean;
  canRedo: boolean;
  shapeCount: number;
}

/**
 * Store for history state (allows UI components to react to changes)
 */
export const historyStateStore = new Store<HistoryState>({
  canUndo: false,
  canRedo: false,
  shapeCount: 0,
});

export class ShapeHistory {
  private committed: Shape[] = [];
  private undone: Shape[] = [];
  private stateStore: Store<HistoryState>;

  constructor(stateStore: Store<HistoryState> = historyStateStore) {
    this.stateStore = stateStore;
    this.updateState();
  }

  /**
   * Commit a shape. Clears the redo buffer.
   */
  push(shape: Shape): void {
    this.committed.push(shape);
    this.undone.length = 0;
    this.updateState();
  }

  /**
   * Move the newest committed shape onto the redo buffer
   * @returns the shape, or undefined when there is nothing to undo
   */
  undo(): Shape | undefined {
    const shape = this.committed.pop();
    if (shape === undefined) return undefined;

    this.undone.push(shape);
    this.updateState();
    return shape;
  }

  /**
   * Move the newest undone shape back onto the committed stack
   * @returns the shape, or undefined when there is nothing to redo
   */
  redo(): Shape | undefined {
    const shape = this.undone.pop();
    if (shape === undefined) return undefined;

    this.committed.push(shape);
    this.updateState();
    return shape;
  }

  /**
   * Drop everything (e.g., when clearing the canvas)
   */
  clear(): void {
    this.committed = [];
    this.undone = [];
    this.updateState();
  }

  canUndo(): boolean {
    return this.committed.length > 0;
  }

  canRedo(): boolean {
    return this.undone.length > 0;
  }

  committedShapes(): readonly Shape[] {
    return this.committed;
  }

  undoneShapes(): readonly Shape[] {
    return this.undone;
  }

  private updateState(): void {
    this.stateStore.set({
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
      shapeCount: this.committed.length,
    });
  }
}
