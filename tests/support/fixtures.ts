import type { ScriptDocument } from "../../src/schemas/script";

export const SUBTRACTION_TOPIC = "Subtraction within 10: 9 - 4";

/** A conforming v0.1 script. Narrated text totals 34 words. */
export function validScript(): ScriptDocument {
	return {
		metadata: {
			version: "0.1",
			language: "en-US",
			tone: "elementary",
			topic: SUBTRACTION_TOPIC,
			duration_estimate: 0,
		},
		intro: {
			title: "Let's Subtract",
			narration: "Today we will take away numbers.",
		},
		explanation: {
			title: "Taking Away",
			narration: "You have 9 apples and give away 4, so count what is left.",
		},
		practice_mcq: {
			title: "Try It",
			question: "What is 9 - 4?",
			options: ["3", "4", "5", "6"],
			correct_answer: 2,
			explanation: "Nine take away four leaves five.",
		},
		summary: {
			title: "Remember",
			narration: "Subtraction means taking away.",
		},
	};
}

/** The document body a model would send back, without metadata. */
export function modelReply(
	mutate: (doc: Record<string, unknown>) => void = () => {},
): string {
	const { metadata: _metadata, ...body } = validScript();
	const doc: Record<string, unknown> = { ...body };
	mutate(doc);
	return JSON.stringify(doc);
}
