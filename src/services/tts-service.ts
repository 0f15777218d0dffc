import {
	ElevenLabsClient,
	ElevenLabsError,
	ElevenLabsTimeoutError,
} from "@elevenlabs/elevenlabs-js";
import { z } from "zod";
import { ExternalServiceError, RequestAbortedError, TransportError } from "../lib/errors";
import { log } from "../lib/logger";
import type { CaptionWord, NarrationAudio } from "../types/narration";

const SERVICE = "ElevenLabs";

/** MP3 at 128kbps = 16KB per second */
const MP3_BYTES_PER_SECOND = 16000;

export interface NarrationAdapter {
	synthesize(text: string, voice: string, signal?: AbortSignal): Promise<NarrationAudio>;
}

export interface ElevenLabsOptions {
	apiKey: string;
	modelId: string;
	timeoutSeconds: number;
}

const CharacterAlignmentSchema = z.object({
	characters: z.array(z.string()),
	characterStartTimesSeconds: z.array(z.number()),
	characterEndTimesSeconds: z.array(z.number()),
});

type CharacterAlignment = z.infer<typeof CharacterAlignmentSchema>;

export function mapNarrationError(error: unknown): Error {
	if (error instanceof ElevenLabsTimeoutError) {
		return new TransportError(SERVICE, error.message, { cause: error });
	}
	if (error instanceof ElevenLabsError) {
		if (error.statusCode === undefined || error.statusCode >= 500) {
			return new TransportError(SERVICE, error.message, {
				cause: error,
				status: error.statusCode,
			});
		}
		return new ExternalServiceError(SERVICE, error.message, { status: error.statusCode }, { cause: error });
	}
	// fetch() reports network failures as TypeError
	if (error instanceof TypeError) {
		return new TransportError(SERVICE, error.message, { cause: error });
	}
	return error instanceof Error ? error : new Error(String(error));
}

export class ElevenLabsNarrationAdapter implements NarrationAdapter {
	private readonly client: ElevenLabsClient;

	constructor(private readonly options: ElevenLabsOptions) {
		if (!options.apiKey) {
			throw new Error("Missing ElevenLabs API key. Set ELEVENLABS_API_KEY in .env");
		}
		this.client = new ElevenLabsClient({ apiKey: options.apiKey });
	}

	/**
	 * Generates TTS audio with word-level timestamps for captions
	 */
	async synthesize(text: string, voice: string, signal?: AbortSignal): Promise<NarrationAudio> {
		const response = await this.client.textToSpeech
			.convertWithTimestamps(
				voice,
				{
					text,
					modelId: this.options.modelId,
					outputFormat: "mp3_44100_128",
				},
				{
					abortSignal: signal,
					timeoutInSeconds: this.options.timeoutSeconds,
					maxRetries: 0,
				},
			)
			.catch((error: unknown) => {
				if (signal?.aborted) throw new RequestAbortedError();
				throw mapNarrationError(error);
			});

		return buildNarrationAudio(text, response.audioBase64, response.alignment);
	}
}

/**
 * Decodes the audio and turns character alignment into word captions. When
 * alignment is missing the duration is estimated from the MP3 size.
 */
export function buildNarrationAudio(
	transcript: string,
	audioBase64: string,
	alignment: unknown,
): NarrationAudio {
	const audioBuffer = Buffer.from(audioBase64, "base64");
	const parsed = CharacterAlignmentSchema.safeParse(alignment);

	if (parsed.success && parsed.data.characters.length > 0) {
		const captions = parseAlignmentToWords(parsed.data);
		const durationSeconds = captions.length > 0 ? captions[captions.length - 1].endTime : 0;
		return { audioBuffer, captions, durationSeconds };
	}

	const durationSeconds = Math.ceil(audioBuffer.length / MP3_BYTES_PER_SECOND);
	log.narration.warn("No alignment data from TTS, using estimated duration", {
		estimatedDuration: durationSeconds,
		bufferSize: audioBuffer.length,
	});

	return {
		audioBuffer,
		captions: createEstimatedCaptions(transcript, durationSeconds),
		durationSeconds,
	};
}

/**
 * Creates estimated captions when alignment data is unavailable
 */
export function createEstimatedCaptions(
	transcript: string,
	totalDuration: number,
): CaptionWord[] {
	const words = transcript.split(/\s+/).filter((w) => w.length > 0);
	if (words.length === 0) return [];

	const timePerWord = totalDuration / words.length;
	return words.map((word, i) => ({
		word,
		startTime: i * timePerWord,
		endTime: (i + 1) * timePerWord,
	}));
}

/**
 * Converts character-level alignment to word-level captions
 */
export function parseAlignmentToWords(alignment: CharacterAlignment): CaptionWord[] {
	const words: CaptionWord[] = [];
	let currentWord = "";
	let wordStartTime = 0;
	let wordEndTime = 0;

	for (let i = 0; i < alignment.characters.length; i++) {
		const char = alignment.characters[i];
		const startTime = alignment.characterStartTimesSeconds[i] ?? 0;
		const endTime = alignment.characterEndTimesSeconds[i] ?? startTime;

		if (char === " " || char === "\n" || char === "\t") {
			if (currentWord.trim()) {
				words.push({
					word: currentWord.trim(),
					startTime: wordStartTime,
					endTime: wordEndTime,
				});
			}
			currentWord = "";
			continue;
		}

		if (currentWord === "") {
			wordStartTime = startTime;
		}

		currentWord += char;
		wordEndTime = endTime;
	}

	if (currentWord.trim()) {
		words.push({
			word: currentWord.trim(),
			startTime: wordStartTime,
			endTime: wordEndTime,
		});
	}

	return words;
}
