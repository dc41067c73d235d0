import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import { buildHomilyConfig, type HomilyConfig } from "../../src/config/homily.js";
import {
  InMemoryComparisonStore,
  InMemoryHomilySegmentStore,
  InMemoryRecordingStore,
} from "../../src/repositories/memoryStores.js";
import { createComparisonTracker } from "../../src/services/business/comparisonTracker.js";
import { createDeviationScorerFromConfig } from "../../src/services/business/deviationScorer.js";
import { processRecording, type HomilyPipelineDeps } from "../../src/services/business/homilyPipeline.js";
import type { HomilySegmentStore } from "../../src/repositories/types.js";
import type { Recording } from "../../src/types/homily.js";
import { AppError, BoundaryNotFoundError, ExtractionFailedError } from "../../src/utils/errors.js";
import { FakeSlicer } from "../fakes/fakeSlicer.js";
import { cue, serviceCues, toVtt } from "../helpers/transcripts.js";

const WEEKEND = "2026-10-18";

const SOWER = "Brothers and sisters, the sower went out to sow his seed.";
const SOWER_WITH_FILLER = "Brothers and sisters, the sower went out to sow, um, his seed.";
const FESTIVAL = "Please remember the parish festival and bring your raffle tickets.";

function recording(id: string): Recording {
  return {
    id,
    weekend_group_id: WEEKEND,
    service_timestamp: "2026-10-18T14:00:00Z",
    audio_path: `/audio/Mass-${WEEKEND}-${id}.mp3`,
    transcript_path: `/transcripts/${id}.vtt`,
    status: "transcribed",
    error_message: null,
  };
}

describe("processRecording", () => {
  let outputDir: string;
  let recordings: InMemoryRecordingStore;
  let segments: InMemoryHomilySegmentStore;
  let comparisons: InMemoryComparisonStore;

  beforeEach(async () => {
    outputDir = await mkdtemp(path.join(os.tmpdir(), "homily-pipeline-"));
    recordings = new InMemoryRecordingStore([recording("0900"), recording("1100"), recording("1700")]);
    segments = new InMemoryHomilySegmentStore();
    comparisons = new InMemoryComparisonStore();
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  function deps(overrides: Partial<HomilyPipelineDeps> = {}, config: HomilyConfig = buildHomilyConfig()): HomilyPipelineDeps {
    return {
      config,
      recordings,
      segments,
      tracker: createComparisonTracker({ store: comparisons, scorer: createDeviationScorerFromConfig(config) }),
      slicer: new FakeSlicer(3600),
      outputDir,
      ...overrides,
    };
  }

  async function status(id: string) {
    return (await recordings.findById(id))?.status;
  }

  it("finalizes a recording whose sibling compared with it while it was listing segments", async () => {
    let siblingStarted = false;
    const interleaved: HomilySegmentStore = {
      upsert: (segment) => segments.upsert(segment),
      findByRecordingId: (id) => segments.findByRecordingId(id),
      async findByWeekendGroup(weekendGroupId) {
        const listed = await segments.findByWeekendGroup(weekendGroupId);
        if (!siblingStarted) {
          siblingStarted = true;
          // 1100 runs to completion between this listing and the rest of 0900's run
          const sibling = await processRecording(
            { recordingId: "1100", transcript: toVtt(serviceCues(SOWER_WITH_FILLER)) },
            deps()
          );
          expect(sibling.comparisons).toHaveLength(1);
          expect(sibling.status).toBe("finalized");
        }
        return listed;
      },
    };

    const result = await processRecording(
      { recordingId: "0900", transcript: toVtt(serviceCues(SOWER)) },
      deps({ segments: interleaved })
    );

    expect(result.comparisons).toEqual([]);
    expect(result.status).toBe("finalized");
    expect(await status("0900")).toBe("finalized");
    expect(await status("1100")).toBe("finalized");
  });

  it("extracts the homily and stores its normalized text", async () => {
    const progress: number[] = [];
    const result = await processRecording(
      { recordingId: "0900", transcript: toVtt(serviceCues(SOWER)) },
      deps({
        updateProgress: async (value) => {
          progress.push(value);
        },
      })
    );

    expect(result.segment).toEqual({
      recording_id: "0900",
      weekend_group_id: WEEKEND,
      start_time: 750,
      end_time: 1450,
      raw_text: `The Gospel of the Lord. Praise to you, Lord Jesus Christ. ${SOWER}`,
      normalized_text:
        "the gospel of the lord praise to you lord jesus christ brothers and sisters the sower went out to sow his seed",
      audio_path: path.join(outputDir, "0900", `Homily-${WEEKEND}-0900.mp3`),
      boundary_source: "markers",
    });
    expect(result.warnings).toEqual([]);
    expect(result.comparisons).toEqual([]);
    // Nothing to compare with yet
    expect(result.status).toBe("scored");
    expect(await segments.findByRecordingId("0900")).toEqual(result.segment);
    expect(progress).toEqual([10, 25, 45, 65, 80, 95, 100]);
  });

  it("compares a weekend's homilies and flags the deviating one", async () => {
    await processRecording({ recordingId: "0900", transcript: toVtt(serviceCues(SOWER)) }, deps());
    const second = await processRecording(
      { recordingId: "1100", transcript: toVtt(serviceCues(SOWER_WITH_FILLER)) },
      deps()
    );

    expect(second.comparisons.map((c) => c.result.similarity_score)).toEqual([1]);
    expect(await status("0900")).toBe("finalized");
    expect(await status("1100")).toBe("finalized");

    const third = await processRecording(
      { recordingId: "1700", transcript: toVtt(serviceCues(FESTIVAL)) },
      deps()
    );

    expect(third.status).toBe("finalized");
    expect(third.comparisons).toHaveLength(2);
    for (const { result } of third.comparisons) {
      expect(result.similarity_score).toBeLessThan(0.6);
      expect(result.deviation_flagged).toBe(true);
    }

    const pending = await comparisons.findPendingNotifications(WEEKEND);
    expect(pending.map((p) => [p.recording_id_a, p.recording_id_b])).toEqual([
      ["0900", "1700"],
      ["1100", "1700"],
    ]);
  });

  it("re-running a recording reuses stored comparisons", async () => {
    await processRecording({ recordingId: "0900", transcript: toVtt(serviceCues(SOWER)) }, deps());
    await processRecording({ recordingId: "1100", transcript: toVtt(serviceCues(SOWER)) }, deps());
    await processRecording({ recordingId: "1700", transcript: toVtt(serviceCues(FESTIVAL)) }, deps());
    const before = comparisons.all();

    const rerun = await processRecording({ recordingId: "0900", transcript: toVtt(serviceCues(SOWER)) }, deps());

    expect(rerun.status).toBe("finalized");
    expect(rerun.comparisons.every((c) => c.cached)).toBe(true);
    expect(comparisons.all()).toEqual(before);
    expect(before).toHaveLength(3);
  });

  it("marks the recording boundary_failed when no homily is found", async () => {
    const transcript = toVtt([cue(400, 410, "Welcome to our parish"), cue(900, 910, "Let us profess our faith.")]);

    await expect(processRecording({ recordingId: "0900", transcript }, deps())).rejects.toThrow(
      BoundaryNotFoundError
    );
    expect(await recordings.findById("0900")).toMatchObject({
      status: "boundary_failed",
      error_message: "BoundaryNotFound: no_introduction_marker",
    });

    const retry = processRecording({ recordingId: "0900", transcript }, deps());
    await expect(retry).rejects.toThrow(AppError);
    await expect(retry).rejects.toThrow("terminal status boundary_failed");
  });

  it("uses the fallback window and keeps it out of comparisons", async () => {
    const config = buildHomilyConfig({
      boundary_fallback: { policy: "default_window", offset_sec: 900, duration_sec: 600 },
    });
    await processRecording({ recordingId: "0900", transcript: toVtt(serviceCues(SOWER)) }, deps({}, config));

    const transcript = toVtt([cue(400, 410, "Welcome to our parish"), cue(1000, 1100, "Today a word on hope.")]);
    const result = await processRecording({ recordingId: "1100", transcript }, deps({}, config));

    expect(result.segment).toMatchObject({
      start_time: 900,
      end_time: 1500,
      raw_text: "Today a word on hope.",
      boundary_source: "fallback",
    });
    expect(result.warnings).toEqual([
      "boundary_fallback: no_introduction_marker",
      "excluded_from_comparison: fallback boundary",
    ]);
    expect(result.comparisons).toEqual([]);
    expect(result.status).toBe("scored");
    expect(comparisons.all()).toEqual([]);
  });

  it("keeps an extraction failure retryable", async () => {
    const transcript = toVtt(serviceCues(SOWER));

    await expect(
      processRecording({ recordingId: "0900", transcript }, deps({ slicer: new FakeSlicer(600) }))
    ).rejects.toThrow(ExtractionFailedError);

    const failed = await recordings.findById("0900");
    expect(failed?.status).toBe("boundary_detected");
    expect(failed?.error_message).toContain("ExtractionFailed [recording=0900 stage=extract]");

    const retried = await processRecording({ recordingId: "0900", transcript }, deps());
    expect(retried.status).toBe("scored");
    expect((await recordings.findById("0900"))?.error_message).toBeNull();
  });

  it("stops between stages when aborted", async () => {
    const controller = new AbortController();

    await expect(
      processRecording(
        { recordingId: "0900", transcript: toVtt(serviceCues(SOWER)) },
        deps({
          signal: controller.signal,
          updateProgress: async (value) => {
            if (value === 45) controller.abort();
          },
        })
      )
    ).rejects.toThrow();

    expect(await status("0900")).toBe("extracted");
    expect(await segments.findByRecordingId("0900")).toBeNull();
  });

  it("reports skipped caption blocks", async () => {
    const transcript = `${toVtt(serviceCues(SOWER))}\nnot a cue\n`;
    const result = await processRecording({ recordingId: "0900", transcript }, deps());

    expect(result.skipped_blocks).toBe(1);
    expect(result.warnings).toEqual(["parse_skipped: 1 blocks"]);
  });
});
