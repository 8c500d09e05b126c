import { defineConfig } from "vite"

export default defineConfig({
  publicDir: false,
  build: {
    target: "node20",
    outDir: "dist",
    sourcemap: true,
    ssr: "src/app/main.ts",
    rollupOptions: {
      output: {
        format: "es",
        entryFileNames: "main.js",
        banner: "#!/usr/bin/env node"
      }
    }
  },
  ssr: {
    target: "node"
  }
})
