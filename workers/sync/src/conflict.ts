/**
 * @calsync/sync-worker -- Conflict detection and resolution.
 *
 * A conflict exists when a record that was already reconciled with the
 * remote has been edited locally more than CONFLICT_DEBOUNCE_MS after the
 * remote's latest version. Detection never touches the local fields; it
 * only stores a snapshot of the remote side for the user to pick from.
 */

import {
  CONFLICT_DEBOUNCE_MS,
  ConflictResolutionError,
  LocalStorageError,
  clearedConflict,
  extractTags,
  type LocalRecord,
  type NormalizedItem,
} from "@calsync/shared";
import type { RecordStore } from "@calsync/store";

export type ConflictResolution = "useLocal" | "useRemote";

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

/** True when applying `item` would overwrite a newer local edit. */
export function isConflict(record: LocalRecord, item: NormalizedItem): boolean {
  if (record.lastLinkedRemoteUpdatedAt === null) {
    return false;
  }
  const localMs = Date.parse(record.updatedAt);
  const remoteMs = Date.parse(item.updatedAt);
  return localMs > remoteMs && localMs - remoteMs > CONFLICT_DEBOUNCE_MS;
}

/**
 * Flag the conflict and snapshot the remote version. An existing flag keeps
 * its detection time; its snapshot is refreshed only by a newer remote.
 */
export function markConflict(record: LocalRecord, item: NormalizedItem, now: string): LocalRecord {
  if (record.hasConflict && record.conflictRemoteUpdatedAt !== null) {
    if (Date.parse(item.updatedAt) <= Date.parse(record.conflictRemoteUpdatedAt)) {
      return record;
    }
  }
  return {
    ...record,
    hasConflict: true,
    conflictDetectedAt: record.hasConflict ? record.conflictDetectedAt ?? now : now,
    conflictRemoteTitle: item.title,
    conflictRemoteBody: item.body,
    conflictRemoteUpdatedAt: item.updatedAt,
    conflictRemoteStartAt: item.startAt,
  };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolve a flagged conflict.
 *
 * - useLocal: keep local fields and queue them for the next push
 * - useRemote: copy the snapshot over the record; the end time keeps the
 *   record's duration
 *
 * @throws ConflictResolutionError when the record has no conflict
 * @throws LocalStorageError (integrity) when the snapshot is incomplete
 */
export function resolveConflict(
  records: RecordStore,
  recordId: string,
  resolution: ConflictResolution,
  now: string,
): LocalRecord {
  const record = records.get(recordId);
  if (record === null || !record.hasConflict) {
    throw new ConflictResolutionError(recordId);
  }

  let resolved: LocalRecord;
  if (resolution === "useLocal") {
    resolved = {
      ...record,
      ...clearedConflict(),
      syncStatus: "pending",
      updatedAt: now,
    };
  } else {
    const title = record.conflictRemoteTitle;
    const body = record.conflictRemoteBody;
    const remoteUpdatedAt = record.conflictRemoteUpdatedAt;
    const startAt = record.conflictRemoteStartAt;
    if (title === null || body === null || remoteUpdatedAt === null || startAt === null) {
      throw new LocalStorageError(
        "integrity",
        `Conflict snapshot for record ${recordId} is incomplete`,
      );
    }
    const durationMs = Date.parse(record.endAt) - Date.parse(record.startAt);
    resolved = {
      ...record,
      ...clearedConflict(),
      title,
      body,
      startAt,
      endAt: new Date(Date.parse(startAt) + durationMs).toISOString(),
      tags: extractTags(title, body),
      lastLinkedRemoteUpdatedAt: remoteUpdatedAt,
      syncStatus: "synced",
      lastSyncedAt: now,
      updatedAt: remoteUpdatedAt,
    };
  }

  records.upsert(resolved);
  console.log("sync: conflict resolved", { record_id: recordId, resolution });
  return resolved;
}
