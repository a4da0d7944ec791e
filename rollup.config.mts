// rollup.config.mts
//
// Rollup configuration for reportcalc.
//
// - ESM and CJS bundles from src/index.ts
// - dependencies stay external (pino, zod)
// - declarations come from `tsc -p tsconfig.build.json` (npm run build)
//
//   npm run build && npm run bundle

import { defineConfig } from "rollup";
import typescript from "@rollup/plugin-typescript";
import commonjs from "@rollup/plugin-commonjs";
import { nodeResolve } from "@rollup/plugin-node-resolve";
import json from "@rollup/plugin-json";
import { builtinModules } from "node:module";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface PackageManifest {
  main?: string;
  module?: string;
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
}

function readManifest(): PackageManifest {
  const parsed: unknown = JSON.parse(readFileSync(resolve(__dirname, "package.json"), "utf8"));
  if (typeof parsed !== "object" || parsed === null) return {};

  const pick = (key: string): unknown => Reflect.get(parsed, key);
  const record = (value: unknown): Record<string, string> =>
    typeof value === "object" && value !== null
      ? Object.fromEntries(
          Object.entries(value).filter((entry): entry is [string, string] => typeof entry[1] === "string"),
        )
      : {};
  const text = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

  return {
    main: text(pick("main")),
    module: text(pick("module")),
    dependencies: record(pick("dependencies")),
    peerDependencies: record(pick("peerDependencies")),
  };
}

const pkg = readManifest();

const dependencyNames = [
  ...Object.keys(pkg.dependencies ?? {}),
  ...Object.keys(pkg.peerDependencies ?? {}),
];

// Node built-ins and declared dependencies, including their subpaths.
const external = (id: string): boolean =>
  builtinModules.includes(id) ||
  id.startsWith("node:") ||
  dependencyNames.some((name) => id === name || id.startsWith(`${name}/`));

export default defineConfig({
  input: resolve(__dirname, "src/index.ts"),
  external,

  output: [
    {
      file: pkg.module ?? "dist/index.mjs",
      format: "esm",
      sourcemap: true,
      exports: "named",
    },
    {
      file: pkg.main ?? "dist/index.cjs",
      format: "cjs",
      sourcemap: true,
      exports: "named",
    },
  ],

  plugins: [
    nodeResolve({
      extensions: [".mjs", ".js", ".json", ".ts"],
      preferBuiltins: true,
    }),
    commonjs(),
    json(),
    typescript({
      tsconfig: "./tsconfig.json",
      include: ["src/**/*.ts"],
      noEmit: false,
      declaration: false,
    }),
  ],

  treeshake: {
    moduleSideEffects: false,
    propertyReadSideEffects: false,
  },

  preserveEntrySignatures: "exports-only",
});
