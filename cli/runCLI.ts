#!/usr/bin/env -S npx tsx
import { FrameBuffer } from "../lib/buffer/FrameBuffer";
import { frameCameraToMesh, type CameraState } from "../lib/camera/buildCamera";
import { createFrameContext } from "../lib/frame/FrameContext";
import { runFrameLoop } from "../lib/frame/runFrameLoop";
import { boundsCenter, computeMeshBounds } from "../lib/mesh/computeMeshBounds";
import { createPngPresenter } from "../lib/present/createPngPresenter";
import { createTerminalPresenter } from "../lib/present/createTerminalPresenter";
import type { Presenter } from "../lib/present/types";
import { DEFAULT_RENDER_OPTIONS } from "../lib/render/getDefaultRenderOptions";
import { resolveRenderOptions } from "../lib/render/resolveRenderOptions";
import { isMainModule } from "./isMainModule";
import { loadOBJ } from "./loadOBJ";
import { parseCliArgs, type ParsedArgs } from "./parseCliArgs";
import { parseVec3 } from "./parseVec3";

const USAGE =
	"Usage: asciimesh model.obj [--w 80] [--h 40] [--fov 60] [--cam x,y,z] [--look x,y,z] [--light x,y,z] [--ambient 0.1] [--ramp chars] [--fps 20] [--speed 0.05] [--frames N] [--flip] [--wireframe] [--fit] [--png out.png] [--stats]";

function readNumber(argv: ParsedArgs, key: string, fallback: number) {
	const raw = argv[key];
	if (typeof raw !== "string") return fallback;
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new Error(`--${key} expects a number, got "${raw}"`);
	}
	return value;
}

function readVec3(argv: ParsedArgs, key: string) {
	const raw = argv[key];
	if (raw === undefined) return null;
	const value = parseVec3(raw);
	if (!value) throw new Error(`--${key} expects x,y,z, got "${String(raw)}"`);
	return value;
}

export async function runCLI(args = process.argv.slice(2)) {
	const argv = parseCliArgs(args);
	const modelPath = argv._[0];
	if (!modelPath) {
		console.error(USAGE);
		process.exitCode = 1;
		return;
	}

	const options = resolveRenderOptions({
		width: readNumber(argv, "w", DEFAULT_RENDER_OPTIONS.width),
		height: readNumber(argv, "h", DEFAULT_RENDER_OPTIONS.height),
		fov: readNumber(argv, "fov", DEFAULT_RENDER_OPTIONS.fov),
		ambient: readNumber(argv, "ambient", DEFAULT_RENDER_OPTIONS.ambient),
		lightDir: readVec3(argv, "light") ?? DEFAULT_RENDER_OPTIONS.lightDir,
		ramp:
			typeof argv.ramp === "string" ? argv.ramp : DEFAULT_RENDER_OPTIONS.ramp,
		wireframe: argv.wireframe === true,
	});
	const pngPath = typeof argv.png === "string" ? argv.png : null;
	const fps = readNumber(argv, "fps", 20);
	const step = readNumber(argv, "speed", 0.05);
	const frames =
		typeof argv.frames === "string"
			? readNumber(argv, "frames", 1)
			: pngPath
				? 1
				: undefined;

	const mesh = await loadOBJ(modelPath, { flipWinding: argv.flip === true });
	const pivot = boundsCenter(computeMeshBounds(mesh));

	const camPos = readVec3(argv, "cam");
	const camera: CameraState = camPos
		? {
				eye: camPos,
				target: readVec3(argv, "look") ?? [0, 0, 0],
				up: [0, 1, 0],
			}
		: frameCameraToMesh(mesh, options.fov);

	const presenter: Presenter = pngPath
		? createPngPresenter(pngPath, { glyphs: options.glyphs })
		: createTerminalPresenter(process.stdout, { hideCursor: true });

	const frame = new FrameBuffer(
		options.width,
		options.height,
		options.background,
	);
	const fitToTerminal = argv.fit === true && !pngPath;
	const abort = new AbortController();
	const onSigint = () => abort.abort();
	process.once("SIGINT", onSigint);

	try {
		const result = await runFrameLoop({
			mesh,
			frame,
			presenter,
			context: createFrameContext(camera, { pivot }),
			options,
			fps,
			step,
			frames,
			signal: abort.signal,
			beforeFrame: fitToTerminal
				? (buf) => {
						const cols = process.stdout.columns;
						const rows = process.stdout.rows;
						if (cols && rows && rows > 1) buf.resize(cols, rows - 1);
					}
				: undefined,
		});
		if (pngPath) {
			console.log(`Wrote ${pngPath} (${frame.width}x${frame.height} cells)`);
		}
		if (argv.stats === true) {
			console.error(
				`frames=${result.framesRendered} ${JSON.stringify(result.lastStats)}`,
			);
		}
	} finally {
		process.off("SIGINT", onSigint);
		await presenter.close?.();
	}
}

if (isMainModule(import.meta)) {
	runCLI().catch((err) => {
		console.error(err instanceof Error ? err.message : err);
		process.exit(1);
	});
}
