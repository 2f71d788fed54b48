/**
 * @calsync/timeline -- Paginated display window over the archive.
 */

export { DisplayPaginationCursor } from "./display-cursor";
export type {
  ArchiveReader,
  DisplayCursorOptions,
  LoadDirection,
  LoadResult,
} from "./display-cursor";
