import { writeFile } from "fs/promises";
import type { AudioSlicer } from "../../src/services/business/segmentExtractor.js";

export interface SliceCall {
  inputPath: string;
  startSec: number;
  endSec: number;
  outputPath: string;
}

/**
 * Writes a small text file in place of audio and records every call.
 */
export class FakeSlicer implements AudioSlicer {
  readonly calls: SliceCall[] = [];
  failSlice: Error | null = null;

  constructor(private durationSec: number | Error = 3600) {}

  async probeDuration(_audioPath: string): Promise<number> {
    if (this.durationSec instanceof Error) {
      throw this.durationSec;
    }
    return this.durationSec;
  }

  async slice(inputPath: string, startSec: number, endSec: number, outputPath: string): Promise<void> {
    this.calls.push({ inputPath, startSec, endSec, outputPath });
    await writeFile(outputPath, `${inputPath} ${startSec}-${endSec}`);
    if (this.failSlice) {
      throw this.failSlice;
    }
  }
}
