/**
 * Reactive Store System
 *
 * Provides a minimal observable store pattern for centralized state management.
 * Components subscribe to stores and automatically receive updates when state changes.
 */
import type { ReactiveController, ReactiveControllerHost } from "lit";
import { toHex } from "./color";
import { DEFAULT_CONFIG } from "./config";
import type { ToolId } from "./tools";

type Listener<T> = (value: T) => void;

/**
 * Generic reactive store with subscribe/publish pattern
 */
export class Store<T> {
  private value: T;
  private listeners = new Set<Listener<T>>();

  constructor(initial: T) {
    this.value = initial;
  }

  /**
   * Get current value
   */
  get(): T {
    return this.value;
  }

  /**
   * Set new value and notify all subscribers
   */
  set(value: T) {
    this.value = value;
    this.listeners.forEach((fn) => fn(value));
  }

  /**
   * Subscribe to value changes
   * @returns Unsubscribe function
   */
  subscribe(fn: Listener<T>): () => void {
    this.listeners.add(fn);
    return () => this.listeners.delete(fn);
  }
}

// ============================================================
// StoreController for Lit Components
// ============================================================

/**
 * Reactive controller that auto-subscribes Lit components to stores.
 * Handles lifecycle (connect/disconnect) and triggers re-renders on updates.
 *
 * Usage:
 *   private tool = new StoreController(this, toolStore);
 *   // Access via this.tool.value in render()
 *   // Set via this.tool.set(newValue)
 */
export class StoreController<T> implements ReactiveController {
  private host: ReactiveControllerHost;
  private store: Store<T>;
  private unsubscribe?: () => void;

  value: T;

  constructor(host: ReactiveControllerHost, store: Store<T>) {
    this.host = host;
    this.store = store;
    this.value = store.get();
    host.addController(this);
  }

  hostConnected() {
    this.value = this.store.get();
    this.unsubscribe = this.store.subscribe((value) => {
      this.value = value;
      this.host.requestUpdate();
    });
  }

  hostDisconnected() {
    this.unsubscribe?.();
  }

  set(value: T) {
    this.store.set(value);
  }
}

// ============================================================
// App-Wide Singleton Stores
// ============================================================

/**
 * Current primary color (hex string, as the color input reports it)
 */
export const colorStore = new Store<string>(toHex(DEFAULT_CONFIG.primaryColor));

/**
 * Current secondary color (hex string)
 */
export const secondaryColorStore = new Store<string>(toHex(DEFAULT_CONFIG.secondaryColor));

/**
 * Current active tool
 */
export const toolStore = new Store<ToolId>("brush");
