import { defineConfig } from "vite";

export default defineConfig({
  server: {
    port: 3000,
    open: "/?verbose",
  },
  build: {
    outDir: "dist",
    sourcemap: true,
    target: "es2022",
  },
});
