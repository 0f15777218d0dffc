import { NARRATION_SEGMENTS, type ScriptDocument } from "../schemas/script";

export interface DurationHeuristic {
	wordsPerSecond: number;
	sectionPauseSeconds: number;
}

export const DEFAULT_DURATION_HEURISTIC: DurationHeuristic = {
	wordsPerSecond: 4,
	sectionPauseSeconds: 1,
};

const NARRATED_SECTIONS = new Set(NARRATION_SEGMENTS.map((s) => s.section));

export function countWords(text: string): number {
	return text.split(/\s+/).filter((w) => w.length > 0).length;
}

/**
 * Approximate spoken length in seconds: narrated words at a fixed rate plus a
 * pause per narrated section, rounded to one decimal. Not measured audio.
 */
export function estimateDuration(
	document: ScriptDocument,
	heuristic: DurationHeuristic = DEFAULT_DURATION_HEURISTIC,
): number {
	const words = NARRATION_SEGMENTS.reduce(
		(total, segment) => total + countWords(segment.text(document)),
		0,
	);
	const seconds =
		words / heuristic.wordsPerSecond +
		NARRATED_SECTIONS.size * heuristic.sectionPauseSeconds;
	return Math.round(seconds * 10) / 10;
}
