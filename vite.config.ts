import { defineConfig } from "vite";

export default defineConfig({
  // Relative asset paths so the built demo can be served from any sub-path
  base: "./",
  server: {
    open: true,          // Auto-open browser on `vite dev`
    port: 5199,          // Fixed dev server port
    strictPort: true,    // Fail if port 5199 is already in use (don't silently pick another)
  },
});
