import { defineConfig } from "tsup";

export default defineConfig({
	entry: ["scripts/index.ts"],
	format: ["esm"],
	target: "node20",
	outDir: "dist",
	clean: true,
	splitting: true,
	sourcemap: true,
	dts: false,
	shims: true,
	banner: { js: "#!/usr/bin/env node" },
});
