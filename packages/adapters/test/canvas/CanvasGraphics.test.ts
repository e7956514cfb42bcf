import { describe, it, expect, beforeEach } from "vitest";
import { rgba, type ISurface } from "@smileys/contracts";
import { CanvasGraphics } from "../../src/canvas/CanvasGraphics";
import { CanvasSurface } from "../../src/canvas/CanvasSurface";
import {
  FakeViewport,
  MockCanvas,
  createMockCanvasFactory,
  type DrawCall,
} from "../_harness/canvas";

const SPEC = { title: "Smileys", size: { width: 640, height: 480 }, resizable: true };

describe("CanvasGraphics", () => {
  let screen: MockCanvas;
  let created: MockCanvas[];
  let viewport: FakeViewport;
  let titleTarget: { title: string };
  let gfx: CanvasGraphics;

  beforeEach(() => {
    screen = new MockCanvas();
    const canvases = createMockCanvasFactory();
    created = canvases.created;
    viewport = new FakeViewport(1280, 720);
    titleTarget = { title: "" };
    gfx = new CanvasGraphics(screen.asElement(), {
      createCanvas: canvases.factory,
      viewport,
      titleTarget,
    });
  });

  function surfaceCanvas(index: number): MockCanvas {
    return created[index];
  }

  function callsOf(canvas: MockCanvas): DrawCall[] {
    return canvas.context.calls;
  }

  describe("windows", () => {
    it("sizes the visible canvas and a back buffer to the window", () => {
      const window = gfx.createWindow(SPEC);

      expect(screen.width).toBe(640);
      expect(screen.height).toBe(480);
      expect(created).toHaveLength(1);
      expect(gfx.getWindowSurface(window)).toMatchObject({ width: 640, height: 480 });
      expect(titleTarget.title).toBe("Smileys");
    });

    it("scales a resizable window to fit the viewport", () => {
      gfx.createWindow(SPEC);

      // min(1280/640, 720/480) = 1.5
      expect(screen.style).toEqual({ width: "960px", height: "720px" });

      viewport.resize(320, 600);
      expect(screen.style).toEqual({ width: "320px", height: "240px" });
    });

    it("leaves a fixed-size window alone", () => {
      gfx.createWindow({ ...SPEC, resizable: false });
      viewport.resize(320, 240);

      expect(screen.style).toEqual({ width: "", height: "" });
      expect(viewport.listenerCount("resize")).toBe(0);
    });

    it("hosts one window per canvas", () => {
      gfx.createWindow(SPEC);
      expect(() => gfx.createWindow(SPEC)).toThrow('Canvas already hosts window "Smileys"');
    });

    it("rejects an empty window", () => {
      expect(() => gfx.createWindow({ title: "x", size: { width: 0, height: 10 } })).toThrow(
        "Invalid window size 0x10"
      );
    });

    it("fails when the canvas has no 2D context", () => {
      screen.contextAvailable = false;
      expect(() => gfx.createWindow(SPEC)).toThrow("Failed to get 2D rendering context");
      expect(created).toHaveLength(0);
    });

    it("maps page coordinates through the canvas's on-screen box", () => {
      const window = gfx.createWindow(SPEC);
      screen.box = { left: 10, top: 20, width: 1280, height: 960 };

      expect(window.toWindowPixel(610, 620)).toEqual({ x: 300, y: 300 });
      expect(window.toWindowPixel(11, 21)).toEqual({ x: 0, y: 0 });
    });

    it("maps one to one before layout", () => {
      const window = gfx.createWindow(SPEC);
      expect(window.toWindowPixel(42, 17)).toEqual({ x: 42, y: 17 });
    });

    it("presents by copying the back buffer to the screen", () => {
      const window = gfx.createWindow(SPEC);
      gfx.present(window);

      expect(callsOf(screen)).toEqual([
        { method: "clearRect", args: [0, 0, 640, 480] },
        { method: "drawImage", args: [surfaceCanvas(0), 0, 0] },
      ]);
      expect(gfx.presentCount).toBe(1);
    });

    it("refuses windows it did not open", () => {
      expect(() => gfx.present({ title: "other", size: { width: 1, height: 1 } })).toThrow(
        'Unknown window "other"'
      );
    });
  });

  describe("surfaces", () => {
    it("creates one canvas per surface", () => {
      const surface = gfx.createSurface(100, 100, 32);

      expect(surface).toBeInstanceOf(CanvasSurface);
      expect(surface.width).toBe(100);
      expect(created[0].width).toBe(100);
      expect(gfx.liveSurfaceCount).toBe(1);
    });

    it("rejects empty and oversized surfaces", () => {
      const small = new CanvasGraphics(screen.asElement(), {
        createCanvas: createMockCanvasFactory().factory,
        maxSurfacePixels: 100,
      });

      expect(() => small.createSurface(0, 5, 32)).toThrow("Invalid surface size 0x5");
      expect(() => small.createSurface(11, 10, 32)).toThrow("Out of memory allocating 11x10 surface");
      expect(small.liveSurfaceCount).toBe(0);
    });

    it("frees a surface once and refuses it afterwards", () => {
      const surface = gfx.createSurface(10, 10, 32);
      gfx.freeSurface(surface);

      expect(gfx.liveSurfaceCount).toBe(0);
      expect(created[0].width).toBe(0);
      expect(() => gfx.freeSurface(surface)).toThrow("Surface used after it was freed");
      expect(() => gfx.fillRect(surface, null, rgba(0, 0, 0))).toThrow("Surface used after it was freed");
    });

    it("will not free the window surface", () => {
      const window = gfx.createWindow(SPEC);
      expect(() => gfx.freeSurface(gfx.getWindowSurface(window))).toThrow(
        "Window surfaces are released with their window"
      );
    });

    it("refuses surfaces from elsewhere", () => {
      const foreign: ISurface = { width: 1, height: 1 };
      expect(() => gfx.setSurfaceRLE(foreign, true)).toThrow("Surface was not created by this backend");
    });

    it("records the RLE hint", () => {
      const surface = gfx.createSurface(10, 10, 32);
      gfx.setSurfaceRLE(surface, true);
      expect(surface.rle).toBe(true);
    });
  });

  describe("fillRect", () => {
    it("clears then fills so the colour replaces what was there", () => {
      const surface = gfx.createSurface(100, 100, 32);
      gfx.fillRect(surface, { x: 10, y: 10, w: 90, h: 90 }, rgba(0, 0, 0, 128));

      expect(callsOf(created[0])).toEqual([
        { method: "clearRect", args: [10, 10, 90, 90] },
        { method: "fillRect", args: [10, 10, 90, 90], fillStyle: "rgba(0, 0, 0, 0.502)" },
      ]);
    });

    it("covers the whole surface when no area is given", () => {
      const surface = gfx.createSurface(100, 50, 32);
      gfx.fillRect(surface, null, rgba(255, 220, 0));

      expect(callsOf(created[0])).toEqual([
        { method: "clearRect", args: [0, 0, 100, 50] },
        { method: "fillRect", args: [0, 0, 100, 50], fillStyle: "rgba(255, 220, 0, 1.000)" },
      ]);
    });

    it("only clears for a transparent colour", () => {
      const surface = gfx.createSurface(10, 10, 32);
      gfx.fillRect(surface, null, rgba(9, 9, 9, 0));

      expect(callsOf(created[0])).toEqual([{ method: "clearRect", args: [0, 0, 10, 10] }]);
    });

    it("fills each rect of a batch", () => {
      const surface = gfx.createSurface(100, 100, 32);
      gfx.fillRects(surface, [{ x: 1, y: 2, w: 3, h: 4 }, { x: 5, y: 6, w: 7, h: 8 }], rgba(1, 2, 3));

      expect(created[0].context.fillRect.mock.calls).toEqual([
        [1, 2, 3, 4],
        [5, 6, 7, 8],
      ]);
    });
  });

  describe("blit", () => {
    it("draws the whole source at the destination corner", () => {
      const window = gfx.createWindow(SPEC);
      const face = gfx.createSurface(100, 100, 32);
      gfx.blit(face, null, gfx.getWindowSurface(window), { x: 170, y: 190, w: 100, h: 100 });

      expect(callsOf(created[0])).toEqual([
        { method: "drawImage", args: [created[1], 0, 0, 100, 100, 170, 190, 100, 100] },
      ]);
    });

    it("clips the source rect and shifts the destination to match", () => {
      const dest = gfx.createSurface(50, 50, 32);
      const src = gfx.createSurface(20, 20, 32);
      gfx.blit(src, { x: -5, y: 10, w: 15, h: 15 }, dest, { x: 3, y: 4, w: 0, h: 0 });

      expect(callsOf(created[0])).toEqual([
        { method: "drawImage", args: [created[1], 0, 10, 10, 10, 8, 4, 10, 10] },
      ]);
    });

    it("draws nothing when the source rect misses the source", () => {
      const dest = gfx.createSurface(50, 50, 32);
      const src = gfx.createSurface(20, 20, 32);
      gfx.blit(src, { x: 30, y: 0, w: 5, h: 5 }, dest, { x: 0, y: 0, w: 5, h: 5 });

      expect(callsOf(created[0])).toEqual([]);
    });
  });

  describe("dispose", () => {
    it("releases every surface and the window", () => {
      const window = gfx.createWindow(SPEC);
      gfx.createSurface(10, 10, 32);
      gfx.createSurface(10, 10, 32);

      gfx.dispose();

      expect(gfx.liveSurfaceCount).toBe(0);
      expect(created.map((c) => c.width)).toEqual([0, 0, 0]);
      expect(viewport.listenerCount()).toBe(0);
      expect(() => gfx.present(window)).toThrow('Unknown window "Smileys"');
    });
  });
});
