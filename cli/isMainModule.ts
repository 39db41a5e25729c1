import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

export function isMainModule(meta: ImportMeta): boolean {
	const entry = process.argv[1];
	if (!entry) return false;
	try {
		return pathToFileURL(realpathSync(entry)).href === meta.url;
	} catch {
		return false;
	}
}
