// Script generation prompts

export const TEMPLATE_DOMAINS = ["math", "science", "language"] as const;

export type TemplateDomain = (typeof TEMPLATE_DOMAINS)[number];

export const SCRIPT_SYSTEM_PROMPT = `You are a senior educational content writer who creates short teaching scripts for elementary students.

Every script has four parts:
- intro: a friendly hook that names what the learner is about to practice
- explanation: a step-by-step walkthrough a teacher would read aloud
- practice_mcq: one multiple-choice question with exactly 4 different options and the 0-based index of the correct option
- summary: a one-paragraph recap

Narrations are written to be spoken aloud: short sentences, no lists, no markdown.

Output valid JSON only. No markdown, no explanation.`;

const OUTPUT_SHAPE = `{"intro":{"title":"...","narration":"..."},"explanation":{"title":"...","narration":"..."},"practice_mcq":{"title":"...","question":"...","options":["...","...","...","..."],"correct_answer":0,"explanation":"..."},"summary":{"title":"...","narration":"..."}}`;

export const DEFAULT_SCRIPT_TEMPLATE = `Write a teaching script for the topic: "{{topic}}"

Language: {{language}}. Tone: {{tone}}.
Keep each narration under 120 words. The practice question must test the topic directly.

Output JSON in this exact shape:
${OUTPUT_SHAPE}`;

export const SCRIPT_TEMPLATES: Record<TemplateDomain, string> = {
	math: `Write a teaching script for the math topic: "{{topic}}"

Language: {{language}}. Tone: {{tone}}.
In the explanation, work through the example one step at a time and say each number out loud in words as well as digits.
Use everyday objects (apples, blocks, fingers) to show the operation.
The practice question must use a different pair of numbers than the explanation, and every option must be a plausible answer a student might give.

Output JSON in this exact shape:
${OUTPUT_SHAPE}`,

	science: `Write a teaching script for the science topic: "{{topic}}"

Language: {{language}}. Tone: {{tone}}.
Start from something the learner can see or touch at home, then explain the idea behind it.
Avoid jargon; when a scientific word is needed, define it in the same sentence.
The practice question should ask the learner to apply the idea to a new everyday situation.

Output JSON in this exact shape:
${OUTPUT_SHAPE}`,

	language: `Write a teaching script for the reading and language topic: "{{topic}}"

Language: {{language}}. Tone: {{tone}}.
Give two short example sentences in the explanation and point out the pattern in each.
The practice question should show one sentence and ask which option completes or describes it correctly.

Output JSON in this exact shape:
${OUTPUT_SHAPE}`,
};
