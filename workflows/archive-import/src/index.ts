/**
 * @calsync/workflow-archive-import -- Full-history import into the archive.
 */

export { ArchiveImporter } from "./importer";
export type {
  ArchiveImportProgress,
  ArchiveProgressCallback,
  ArchiveImportRunOptions,
  ArchiveImportResult,
  ArchiveImporterOptions,
} from "./importer";
export { planImportRanges } from "./ranges";
export type { ImportRange, RangePlanOptions } from "./ranges";
