// File: vite.config.ts
import { defineConfig } from "vite";

// Convert the export to a function to access the command
export default defineConfig(({ command }) => {
  const isProduction = command === "build";

  return {
    root: ".",
    base: isProduction ? "./" : "/",
    build: {
      outDir: "dist/public",
      emptyOutDir: true,
    },
    server: {
      proxy: {
        // Lets VITE_RECORDS_SERVER_URL point at /v1 during development.
        "/v1": {
          target: "http://localhost:8888",
          changeOrigin: true,
        },
      },
    },
  };
});
