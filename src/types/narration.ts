export interface CaptionWord {
  word: string;
  startTime: number;
  endTime: number;
}

export interface NarrationAudio {
  audioBuffer: Buffer;
  captions: CaptionWord[];
  durationSeconds: number;
}

export type NarrationStatus = "completed" | "failed";

export interface NarrationSegmentResult {
  segment: string;
  voice: string;
  status: NarrationStatus;
  audioKey?: string;
  durationSeconds?: number;
  captions?: CaptionWord[];
  error?: string;
}
