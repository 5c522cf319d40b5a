import { existsSync } from "node:fs";
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type pino from "pino";
import { formatSRT, type SubtitleBlock } from "./srt.ts";

export const DRAFT_INFO_FILE = "draft_info.json";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function records(value: unknown): Record<string, unknown>[] {
	return Array.isArray(value) ? value.filter(isRecord) : [];
}

function numberOr(value: unknown, fallback: number): number {
	return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/** CapCut stores text materials as a JSON string with a `text` field. */
function materialText(material: Record<string, unknown>): string {
	if (typeof material.content !== "string") return "";
	try {
		const content: unknown = JSON.parse(material.content);
		return isRecord(content) && typeof content.text === "string" ? content.text.trim() : "";
	} catch (error) {
		// Materials that are not JSON carry no subtitle text.
		if (error instanceof SyntaxError) return "";
		throw error;
	}
}

function microsToMs(us: number): number {
	return Math.max(0, Math.round(us / 1000));
}

/**
 * Collects the cues of every text track in a CapCut draft, ordered by start
 * time and numbered from 1.
 */
export function extractCapCutBlocks(draft: unknown): SubtitleBlock[] {
	if (!isRecord(draft)) return [];

	const materials: Record<string, unknown> = isRecord(draft.materials) ? draft.materials : {};
	const texts = new Map<string, Record<string, unknown>>();
	for (const text of records(materials.texts)) {
		if (typeof text.id === "string") texts.set(text.id, text);
	}

	const cues: { start: number; end: number; text: string }[] = [];
	for (const track of records(draft.tracks)) {
		if (track.type !== "text") continue;

		for (const segment of records(track.segments)) {
			const material = typeof segment.material_id === "string" ? texts.get(segment.material_id) : undefined;
			if (!material) continue;

			const text = materialText(material);
			if (!text) continue;

			const range: Record<string, unknown> = isRecord(segment.target_timerange) ? segment.target_timerange : {};
			const start = numberOr(range.start, 0);
			const duration = numberOr(range.duration, 0);
			cues.push({ start, end: start + duration, text });
		}
	}

	return cues
		.sort((a, b) => a.start - b.start)
		.map((cue, i): SubtitleBlock => ({
			index: i + 1,
			start: { kind: "time", ms: microsToMs(cue.start), separator: "," },
			end: { kind: "time", ms: microsToMs(cue.end), separator: "," },
			text: cue.text,
		}));
}

export function safeProjectName(name: string): string {
	return Array.from(name)
		.filter((c) => /[\p{L}\p{N} _]/u.test(c))
		.join("")
		.trimEnd();
}

export interface CapCutProject {
	name: string;
	dir: string;
}

async function readDraft(projectDir: string): Promise<unknown> {
	return JSON.parse(await readFile(path.join(projectDir, DRAFT_INFO_FILE), "utf8"));
}

export async function listCapCutProjects(baseDir: string, logger: pino.Logger): Promise<CapCutProject[]> {
	if (!existsSync(baseDir)) return [];

	const entries = await readdir(baseDir, { withFileTypes: true });
	const projects: CapCutProject[] = [];

	for (const entry of entries) {
		if (!entry.isDirectory()) continue;
		const dir = path.join(baseDir, entry.name);
		if (!existsSync(path.join(dir, DRAFT_INFO_FILE))) continue;

		let name = `Untitled project (${entry.name})`;
		try {
			const draft = await readDraft(dir);
			if (isRecord(draft) && typeof draft.draft_name === "string" && draft.draft_name) {
				name = `${draft.draft_name} (${entry.name})`;
			}
		} catch (error) {
			logger.warn(
				{ project: entry.name, error: error instanceof Error ? error.message : String(error) },
				"Could not read project info, using folder name"
			);
		}
		projects.push({ name, dir });
	}

	return projects.sort((a, b) => a.name.localeCompare(b.name));
}

export type CapCutExportResult = { status: "exported"; outputPath: string; blocks: number } | { status: "empty" };

export async function exportCapCutProject(
	projectDir: string,
	outputDir: string
): Promise<CapCutExportResult> {
	const draft = await readDraft(projectDir);
	const blocks = extractCapCutBlocks(draft);
	if (blocks.length === 0) return { status: "empty" };

	const folder = path.basename(projectDir);
	const draftName = isRecord(draft) && typeof draft.draft_name === "string" ? draft.draft_name : folder;
	const outputPath = path.join(outputDir, `${safeProjectName(draftName)}_${folder}.srt`);

	await mkdir(outputDir, { recursive: true });
	await writeFile(outputPath, `\uFEFF${formatSRT(blocks)}`, "utf8");
	return { status: "exported", outputPath, blocks: blocks.length };
}
