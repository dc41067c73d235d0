/**
 * In-Memory Stores
 * Process-local implementations of the store interfaces.
 * Used by local scripts and tests; each instance holds its own state.
 */

import type {
  ComparisonResult,
  HomilySegment,
  PairKey,
  Recording,
  RecordingStatus,
} from "../types/homily.js";
import { NotFoundError } from "../utils/errors.js";
import type { ComparisonStore, HomilySegmentStore, InsertOutcome, RecordingStore } from "./types.js";

function pairId(key: PairKey): string {
  return `${key.weekend_group_id}:${key.recording_id_a}:${key.recording_id_b}`;
}

export class InMemoryRecordingStore implements RecordingStore {
  private rows = new Map<string, Recording>();

  constructor(recordings: Recording[] = []) {
    for (const recording of recordings) {
      this.rows.set(recording.id, { ...recording });
    }
  }

  async findById(id: string): Promise<Recording | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async updateStatus(id: string, status: RecordingStatus, errorMessage?: string | null): Promise<Recording> {
    const row = this.rows.get(id);
    if (!row) {
      throw new NotFoundError("Recording", id);
    }
    const updated = { ...row, status, error_message: errorMessage ?? null };
    this.rows.set(id, updated);
    return { ...updated };
  }
}

export class InMemoryHomilySegmentStore implements HomilySegmentStore {
  private rows = new Map<string, HomilySegment>();

  async upsert(segment: HomilySegment): Promise<HomilySegment> {
    this.rows.set(segment.recording_id, { ...segment });
    return { ...segment };
  }

  async findByRecordingId(recordingId: string): Promise<HomilySegment | null> {
    const row = this.rows.get(recordingId);
    return row ? { ...row } : null;
  }

  async findByWeekendGroup(weekendGroupId: string): Promise<HomilySegment[]> {
    return [...this.rows.values()]
      .filter((row) => row.weekend_group_id === weekendGroupId)
      .map((row) => ({ ...row }));
  }
}

export class InMemoryComparisonStore implements ComparisonStore {
  private rows = new Map<string, ComparisonResult>();

  async find(key: PairKey): Promise<ComparisonResult | null> {
    const row = this.rows.get(pairId(key));
    return row ? { ...row } : null;
  }

  async insertIfAbsent(result: ComparisonResult): Promise<InsertOutcome> {
    const id = pairId(result);
    const existing = this.rows.get(id);
    if (existing) {
      return { result: { ...existing }, inserted: false };
    }
    this.rows.set(id, { ...result });
    return { result: { ...result }, inserted: true };
  }

  async findByWeekendGroup(weekendGroupId: string): Promise<ComparisonResult[]> {
    return this.all().filter((row) => row.weekend_group_id === weekendGroupId);
  }

  async findPendingNotifications(weekendGroupId?: string): Promise<ComparisonResult[]> {
    return this.all().filter(
      (row) =>
        row.deviation_flagged &&
        !row.notified &&
        (weekendGroupId === undefined || row.weekend_group_id === weekendGroupId)
    );
  }

  async markNotified(key: PairKey): Promise<ComparisonResult | null> {
    const id = pairId(key);
    const row = this.rows.get(id);
    if (!row) {
      return null;
    }
    const updated = { ...row, notified: true };
    this.rows.set(id, updated);
    return { ...updated };
  }

  /** Every stored result, oldest first. */
  all(): ComparisonResult[] {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }
}
