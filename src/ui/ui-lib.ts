/**
 * Paint UI Components
 *
 * Lit elements for the toolbar around the drawing canvas. Components only
 * read stores and dispatch DOM events; App decides what an event does.
 */
import { LitElement, html, css } from "lit";
import { customElement } from "lit/decorators.js";
import { tools, type ToolId } from "../core/tools";
import { colorStore, secondaryColorStore, toolStore, StoreController } from "../core/stores";
import { historyStateStore } from "../core/history";

// ============================================================
// Toolbar
// ============================================================

@customElement("paint-toolbar")
export class PaintToolbar extends LitElement {
  private tool = new StoreController(this, toolStore);
  private color = new StoreController(this, colorStore);
  private secondaryColor = new StoreController(this, secondaryColorStore);
  private history = new StoreController(this, historyStateStore);

  static styles = css`
    :host {
      display: block;
      font: 13px/1.2 system-ui, sans-serif;
    }

    .toolbar {
      display: flex;
      gap: 6px;
      align-items: center;
      padding: 6px 0;
    }

    button {
      padding: 4px 10px;
      border: 1px solid #9f9f9f;
      background: #f4f4f4;
      cursor: pointer;
    }

    button.active {
      background: #037ffc;
      border-color: #025ab3;
      color: #fff;
    }

    button:disabled {
      opacity: 0.4;
      cursor: default;
    }

    .divider {
      width: 1px;
      align-self: stretch;
      background: #d0d0d0;
    }
  `;

  private emit(name: string, detail?: unknown) {
    this.dispatchEvent(
      new CustomEvent(name, { detail, bubbles: true, composed: true })
    );
  }

  private setTool(tool: ToolId) {
    this.tool.set(tool);
    this.emit("tool-change", tool);
  }

  private onColorInput(e: Event, eventName: "color-change" | "secondary-color-change") {
    if (e.target instanceof HTMLInputElement) {
      this.emit(eventName, e.target.value);
    }
  }

  render() {
    const { canUndo, canRedo } = this.history.value;

    return html`
      <div class="toolbar">
        ${tools.map(
          (t) => html`
            <button
              class=${this.tool.value === t.id ? "active" : ""}
              title=${`${t.name} (${t.hotkey.toUpperCase()})`}
              @click=${() => this.setTool(t.id)}
            >
              ${t.name}
            </button>
          `
        )}
        <span class="divider"></span>
        <button ?disabled=${!canUndo} @click=${() => this.emit("undo")}>Undo</button>
        <button ?disabled=${!canRedo} @click=${() => this.emit("redo")}>Redo</button>
        <button @click=${() => this.emit("clear")}>Clear</button>
        <button @click=${() => this.emit("save")}>Save</button>
        <span class="divider"></span>
        <input
          type="color"
          title="Primary color"
          .value=${this.color.value.slice(0, 7)}
          @change=${(e: Event) => this.onColorInput(e, "color-change")}
        />
        <input
          type="color"
          title="Secondary color"
          .value=${this.secondaryColor.value.slice(0, 7)}
          @change=${(e: Event) => this.onColorInput(e, "secondary-color-change")}
        />
      </div>
    `;
  }
}

declare global {
  interface HTMLElementTagNameMap {
    "paint-toolbar": PaintToolbar;
  }
}
