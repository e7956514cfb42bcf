import { createDomCanvas } from "@smileys/adapters";

import { runApp } from "./runApp";

const statusDiv = document.getElementById("status");

function setStatus(text: string, className = ""): void {
  if (!statusDiv) return;
  statusDiv.textContent = text;
  statusDiv.className = className;
}

/**
 * Start the demo on the page's canvas. `?verbose` logs events and ticks
 * to the console.
 */
async function main(): Promise<void> {
  const canvas = document.getElementById("canvas");
  if (!(canvas instanceof HTMLCanvasElement)) {
    setStatus("No canvas element on the page", "error");
    return;
  }

  const verbose = new URLSearchParams(window.location.search).has("verbose");
  setStatus("Click: move yellow · Arrows: move pink · Space: new colours · Q / Esc: stop");
  canvas.focus();

  const code = await runApp(
    { canvas, page: window, document, createCanvas: createDomCanvas },
    { verbose }
  );

  if (code === 0) {
    setStatus("Stopped. Reload to start again.");
  } else {
    setStatus("Stopped after an error (see the console)", "error");
  }
}

main().catch((err) => {
  console.error("[app] Error:", err);
  setStatus("Failed to start (see the console)", "error");
});
