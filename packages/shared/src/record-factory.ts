/**
 * @calsync/shared -- Building and editing local records.
 *
 * Every path that creates or edits a record goes through here so that
 * tags are always re-derived and the sync status is always set.
 */

import { generateId } from "./id";
import { extractTags } from "./tags";
import type { LocalRecord } from "./types";

/** Fields a caller may author. */
export interface RecordDraft {
  title: string;
  body?: string;
  startAt: string;
  endAt: string;
  allDay?: boolean;
  collectionId?: string | null;
}

/** A new locally managed record, pending its first push. */
export function newLocalRecord(draft: RecordDraft, now: string): LocalRecord {
  const body = draft.body ?? "";
  return {
    recordId: generateId("record"),
    collectionId: draft.collectionId ?? null,
    remoteItemId: null,
    title: draft.title,
    body,
    startAt: draft.startAt,
    endAt: draft.endAt,
    allDay: draft.allDay ?? false,
    tags: extractTags(draft.title, body),
    syncStatus: "pending",
    lastSyncedAt: null,
    isDeleted: false,
    deletedAt: null,
    createdAt: now,
    updatedAt: now,
    origin: "local",
    lastLinkedRemoteUpdatedAt: null,
    ...clearedConflict(),
  };
}

/** Apply a local edit: stamp updatedAt, re-derive tags, queue for push. */
export function editRecord(
  record: LocalRecord,
  changes: Partial<RecordDraft>,
  now: string,
): LocalRecord {
  const title = changes.title ?? record.title;
  const body = changes.body ?? record.body;
  return {
    ...record,
    title,
    body,
    startAt: changes.startAt ?? record.startAt,
    endAt: changes.endAt ?? record.endAt,
    allDay: changes.allDay ?? record.allDay,
    collectionId: changes.collectionId !== undefined ? changes.collectionId : record.collectionId,
    tags: extractTags(title, body),
    syncStatus: "pending",
    updatedAt: now,
  };
}

/** Conflict fields in their cleared state. */
export function clearedConflict(): Pick<
  LocalRecord,
  | "hasConflict"
  | "conflictDetectedAt"
  | "conflictRemoteTitle"
  | "conflictRemoteBody"
  | "conflictRemoteUpdatedAt"
  | "conflictRemoteStartAt"
> {
  return {
    hasConflict: false,
    conflictDetectedAt: null,
    conflictRemoteTitle: null,
    conflictRemoteBody: null,
    conflictRemoteUpdatedAt: null,
    conflictRemoteStartAt: null,
  };
}
