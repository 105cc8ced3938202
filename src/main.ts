/**
 * Entry point: start the paint app once the DOM is ready.
 */
import { App } from "./core/app";

function start() {
  const app = new App();
  app.init();
}

if (document.readyState === "loading") {
  document.addEventListener("DOMContentLoaded", start);
} else {
  start();
}
