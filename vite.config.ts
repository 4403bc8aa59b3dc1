import { fileURLToPath, URL } from "node:url";
import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import tailwindcss from "@tailwindcss/vite";

// https://vite.dev/config/
export default defineConfig({
  plugins: [react(), tailwindcss()],
  resolve: {
    alias: [
      {
        find: "@",
        replacement: fileURLToPath(new URL("./src", import.meta.url)),
      },
    ],
  },
  build: {
    chunkSizeWarningLimit: 4000,
    rollupOptions: {
      output: {
        manualChunks(id) {
          if (!id.includes("node_modules")) {
            return undefined;
          }

          const normalizedId = id.replaceAll("\\", "/");
          const nodeModulesPrefix = "/node_modules/";
          const packagePath = normalizedId.slice(
            normalizedId.lastIndexOf(nodeModulesPrefix) + nodeModulesPrefix.length,
          );
          const packageName = packagePath.startsWith("@")
            ? packagePath.split("/").slice(0, 2).join("/")
            : packagePath.split("/")[0];

          if (packageName === "monaco-editor" || packageName.startsWith("@monaco-editor/")) {
            return "monaco-vendor";
          }

          if (packageName === "lucide-react") {
            return "icons-vendor";
          }

          if (
            packageName === "react" ||
            packageName === "react-dom" ||
            packageName === "scheduler"
          ) {
            return "react-vendor";
          }

          return "vendor";
        },
      },
    },
  },
  server: {
    port: 1430,
    strictPort: true,
  },
});
