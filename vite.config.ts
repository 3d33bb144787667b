import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],
  clearScreen: false,
  server: {
    port: 5173,
    strictPort: true,
    proxy: {
      "/api": "http://localhost:8080",
    },
  },
  build: {
    outDir: "dist/dashboard",
    target: "es2022",
    minify: "esbuild",
    sourcemap: false,
  },
});
