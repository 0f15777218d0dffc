import { ElevenLabsError } from "@elevenlabs/elevenlabs-js";
import { describe, expect, it } from "vitest";
import { ExternalServiceError, TransportError } from "../../src/lib/errors";
import {
	buildNarrationAudio,
	createEstimatedCaptions,
	mapNarrationError,
	parseAlignmentToWords,
} from "../../src/services/tts-service";

const alignment = {
	characters: ["H", "i", " ", "y", "o"],
	characterStartTimesSeconds: [0, 0.1, 0.2, 0.3, 0.4],
	characterEndTimesSeconds: [0.1, 0.2, 0.3, 0.4, 0.5],
};

describe("parseAlignmentToWords", () => {
	it("groups characters into timed words", () => {
		expect(parseAlignmentToWords(alignment)).toEqual([
			{ word: "Hi", startTime: 0, endTime: 0.2 },
			{ word: "yo", startTime: 0.3, endTime: 0.5 },
		]);
	});
});

describe("createEstimatedCaptions", () => {
	it("spreads words evenly", () => {
		expect(createEstimatedCaptions("one two three four", 2)).toEqual([
			{ word: "one", startTime: 0, endTime: 0.5 },
			{ word: "two", startTime: 0.5, endTime: 1 },
			{ word: "three", startTime: 1, endTime: 1.5 },
			{ word: "four", startTime: 1.5, endTime: 2 },
		]);
	});

	it("returns nothing for an empty transcript", () => {
		expect(createEstimatedCaptions(" ", 3)).toEqual([]);
	});
});

describe("buildNarrationAudio", () => {
	it("uses alignment for captions and duration", () => {
		const audio = buildNarrationAudio("Hi yo", Buffer.from("abc").toString("base64"), alignment);

		expect(audio.audioBuffer.toString()).toBe("abc");
		expect(audio.durationSeconds).toBe(0.5);
		expect(audio.captions).toHaveLength(2);
	});

	it("estimates from the audio size without alignment", () => {
		const base64 = Buffer.alloc(32_000).toString("base64");

		const audio = buildNarrationAudio("one two three four", base64, null);

		expect(audio.durationSeconds).toBe(2);
		expect(audio.captions[3]).toEqual({ word: "four", startTime: 1.5, endTime: 2 });
	});

	it("falls back when alignment has the wrong shape", () => {
		const base64 = Buffer.alloc(16_001).toString("base64");

		const audio = buildNarrationAudio("hello", base64, { characters: ["h"] });

		expect(audio.durationSeconds).toBe(2);
		expect(audio.captions).toEqual([{ word: "hello", startTime: 0, endTime: 2 }]);
	});
});

describe("mapNarrationError", () => {
	it("treats a client error as an external service failure", () => {
		const mapped = mapNarrationError(new ElevenLabsError({ message: "bad key", statusCode: 401 }));

		expect(mapped).toBeInstanceOf(ExternalServiceError);
	});

	it("treats a server error as transport", () => {
		const mapped = mapNarrationError(new ElevenLabsError({ message: "busy", statusCode: 503 }));

		expect(mapped).toBeInstanceOf(TransportError);
	});

	it("treats fetch failures as transport", () => {
		expect(mapNarrationError(new TypeError("fetch failed"))).toBeInstanceOf(TransportError);
	});
});
