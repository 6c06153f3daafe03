import { build as esbuild } from "esbuild";
import { rm, mkdir } from "fs/promises";

// Packages with native bindings stay external and load from node_modules at run time
const nativeModules = ["bcrypt", "pg-native"];

async function buildServer() {
  const outDir = "dist";

  await rm(`${outDir}/server.cjs`, { force: true });
  await mkdir(outDir, { recursive: true });

  console.log("Bundling server...");

  await esbuild({
    entryPoints: ["server/index.ts"],
    platform: "node",
    target: "node20",
    bundle: true,
    format: "cjs",
    outfile: `${outDir}/server.cjs`,
    define: {
      "process.env.NODE_ENV": '"production"',
    },
    minify: true,
    sourcemap: true,
    external: nativeModules,
    alias: {
      "@shared": "./shared",
    },
    logLevel: "info",
  });

  console.log(`\nServer bundle written to ${outDir}/server.cjs`);
  console.log("Run it with: npm start");
}

buildServer().catch((err) => {
  console.error(err);
  process.exit(1);
});
