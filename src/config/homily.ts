/**
 * Homily Pipeline Configuration
 * Loads and validates marker lists, duration limits and scoring options.
 * Every key is optional in the JSON file; missing keys take the defaults below.
 */

import { readFile } from "fs/promises";
import { z } from "zod";

export const DEFAULT_INTRODUCTION_MARKERS = [
  "let us now turn to the gospel",
  "the gospel of the lord",
  "praise to you lord jesus christ",
];

export const DEFAULT_CLOSING_MARKERS = [
  "let us profess our faith",
  "i believe in one god",
  "we pray to the lord",
  "lord hear our prayer",
  "let us offer our prayers",
  "prayers of petition",
  "prayer of the faithful",
  "prayers of the faithful",
];

export const DEFAULT_STOPWORDS = ["um", "uh", "uhm", "umm", "er", "erm", "ah", "hmm", "mm"];

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const BoundaryFallbackSchema = z.discriminatedUnion("policy", [
  z.object({ policy: z.literal("none") }),
  z.object({
    policy: z.literal("default_window"),
    offset_sec: z.number().min(0),
    duration_sec: z.number().positive(),
  }),
]);
export type BoundaryFallback = z.infer<typeof BoundaryFallbackSchema>;

export const HomilyConfigSchema = z.object({
  introduction_markers: z.array(z.string().min(1)).min(1).default(DEFAULT_INTRODUCTION_MARKERS),
  closing_markers: z.array(z.string().min(1)).min(1).default(DEFAULT_CLOSING_MARKERS),
  min_elapsed_floor_sec: z.number().min(0).default(300),
  max_homily_duration_sec: z.number().positive().default(1200),
  min_plausible_duration_sec: z.number().min(0).default(60),
  closing_marker_window: z.number().int().min(1).default(1),
  deviation_threshold: z.number().min(0).max(1).default(0.6),
  stopword_list: z.array(z.string()).default(DEFAULT_STOPWORDS),
  collapse_repeated_tokens: z.boolean().default(true),
  similarity_metric: z.enum(["lcs_ratio", "token_jaccard"]).default("lcs_ratio"),
  boundary_fallback: BoundaryFallbackSchema.default({ policy: "none" }),
  compare_fallback_segments: z.boolean().default(false),
  weekend: z
    .object({
      time_zone: z.string().min(1).refine(isValidTimeZone, { message: "Unknown IANA time zone" }).default("UTC"),
      vigil_start_hour: z.number().int().min(0).max(23).default(15),
    })
    .default({}),
});
export type HomilyConfig = z.infer<typeof HomilyConfigSchema>;
export type HomilyConfigInput = z.input<typeof HomilyConfigSchema>;

/**
 * Builds a config from partial options, filling defaults.
 * Throws ZodError on invalid values.
 */
export function buildHomilyConfig(input: HomilyConfigInput = {}): HomilyConfig {
  return HomilyConfigSchema.parse(input);
}

/**
 * Reads the JSON config file. Fails fast on unreadable or invalid files.
 */
export async function loadHomilyConfig(configPath: string): Promise<HomilyConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (error) {
    throw new Error(`Failed to read homily config at ${configPath}: ${String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid JSON in homily config ${configPath}: ${String(error)}`);
  }

  const result = HomilyConfigSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid homily config ${configPath}: ${details}`);
  }

  console.log(`[config] ✓ Loaded homily config from ${configPath}`);
  return result.data;
}
