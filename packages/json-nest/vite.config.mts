import path from "node:path"
import { fileURLToPath } from "node:url"
import { defineConfig } from "vite"
import dts from "vite-plugin-dts"

const rootDir = fileURLToPath(new URL(".", import.meta.url))
const resolvePath = (str: string) => path.resolve(rootDir, str)

export default defineConfig({
  build: {
    target: "node20",
    lib: {
      entry: resolvePath("./src/index.ts"),
      name: "json-nest",
    },
    sourcemap: "inline",
    minify: false,

    rollupOptions: {
      external: ["fast-deep-equal"],

      output: [
        {
          format: "esm",
          entryFileNames: "json-nest.esm.mjs",
        },
        {
          name: "json-nest",
          format: "umd",
          globals: {
            "fast-deep-equal": "fastDeepEqual",
          },
        },
      ],
    },
  },
  plugins: [
    dts({
      tsconfigPath: resolvePath("./tsconfig.json"),
      outDir: resolvePath("./dist/types"),
    }),
  ],
})
