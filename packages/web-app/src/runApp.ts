/**
 * Application wiring: canvas backend → scene → loop, with teardown
 * guaranteed before any error is reported.
 */

import type { IClock, IRandom, WindowSpec } from "@smileys/contracts";
import {
  CanvasGraphics,
  DomEventSource,
  MathRandom,
  SystemClock,
  type CanvasFactory,
  type ViewportHost,
} from "@smileys/adapters";
import {
  Scene,
  SceneLoop,
  SceneRenderer,
  type SceneLoopConfig,
  type SceneSetup,
} from "@smileys/engine";

export const WINDOW_SPEC: WindowSpec = {
  title: "Smileys",
  position: { x: 0, y: 0 },
  size: { width: 640, height: 480 },
  resizable: true,
};

export interface AppHost {
  /** The visible canvas; pointer presses are read from it */
  canvas: HTMLCanvasElement;
  /** Keyboard, resize, focus and pagehide source, and the viewport (usually `window`) */
  page: ViewportHost;
  /** Receives the window title (usually `document`) */
  document?: { title: string } | null;
  /** Creates offscreen canvases for the smiley surfaces */
  createCanvas: CanvasFactory;
  clock?: IClock;
  random?: IRandom;
}

export interface AppOptions {
  verbose?: boolean;
  window?: WindowSpec;
  scene?: SceneSetup;
  loop?: SceneLoopConfig;
}

/**
 * Run the demo until the user quits. Resolves 0 on a clean exit, 1 when
 * setup or the loop failed.
 */
export async function runApp(host: AppHost, options: AppOptions = {}): Promise<number> {
  const verbose = options.verbose ?? false;
  const gfx = new CanvasGraphics(host.canvas, {
    createCanvas: host.createCanvas,
    viewport: host.page,
    titleTarget: host.document ?? null,
  });
  let events: DomEventSource | null = null;
  let scene: Scene | null = null;

  let failure: unknown = null;
  try {
    const appWindow = gfx.createWindow(options.window ?? WINDOW_SPEC);

    events = new DomEventSource({
      pointerTarget: host.canvas,
      windowTarget: host.page,
      mapPointer: (clientX, clientY) => appWindow.toWindowPixel(clientX, clientY),
    });
    events.start();

    scene = Scene.create(gfx, host.random ?? new MathRandom(), options.scene);

    const renderer = new SceneRenderer(gfx);
    renderer.attach(appWindow);

    const loop = new SceneLoop(
      { scene, renderer, events, clock: host.clock ?? new SystemClock() },
      { ...options.loop, verbose }
    );

    if (verbose) {
      console.log(`[app] window "${appWindow.title}" ${appWindow.size.width}x${appWindow.size.height}`);
    }

    loop.render();
    await loop.run();
    renderer.detach();

    if (verbose) {
      console.log(`[app] stopped after ${renderer.frameCount} frames`);
    }
  } catch (err) {
    failure = err;
  } finally {
    scene?.dispose();
    events?.dispose();
    gfx.dispose();
  }

  if (failure !== null) {
    console.error("[app] Error:", failure instanceof Error ? failure.message : String(failure));
    return 1;
  }
  return 0;
}
