import { stat, writeFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import * as p from "@clack/prompts";
import color from "picocolors";
import { confirmOrExit } from "../shared/cli.js";
import { CONFIG_FILENAME, ConfigError } from "../shared/config.js";
import { discoverProject, renderInitConfig } from "./discovery.js";

export interface InitOptions {
	yes: boolean;
	configPath?: string;
}

/** Discover code and static directories and write a starter config. Returns the path written, or null. */
export const runInit = async (projectDirArg: string | undefined, options: InitOptions): Promise<string | null> => {
	const projectDir = resolve(process.cwd(), projectDirArg ?? ".");
	const info = await stat(projectDir).catch(() => null);
	if (!info) throw new ConfigError(`No such directory: ${projectDir}`);
	if (!info.isDirectory()) throw new ConfigError(`Not a directory: ${projectDir}`);

	const s = p.spinner();
	s.start("Looking for static file references");
	const discovery = await discoverProject(projectDir);
	s.stop(`${discovery.codeFiles.length} code files reference ${discovery.staticFiles.length} static files`);

	if (discovery.codeFiles.length === 0) {
		p.log.warn("No references found; the config will point at the project directory.");
	} else {
		p.log.info(`Code directories:\n${discovery.codeDirs.map((d) => `  ${d}`).join("\n")}`);
		p.log.info(`Static directories:\n${discovery.staticDirs.map((d) => `  ${d}`).join("\n")}`);
	}

	const target = options.configPath
		? isAbsolute(options.configPath)
			? options.configPath
			: join(projectDir, options.configPath)
		: join(projectDir, CONFIG_FILENAME);

	const exists = await stat(target).then(
		() => true,
		() => false,
	);
	if (exists && !options.yes) {
		const overwrite = await confirmOrExit(`${target} exists. Overwrite?`, false);
		if (!overwrite) {
			p.log.warn("Config not written.");
			return null;
		}
	}

	await writeFile(target, renderInitConfig(discovery), "utf-8");
	p.log.success(`Wrote ${color.cyan(target)}`);
	return target;
};
