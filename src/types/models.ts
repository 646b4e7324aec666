/** Kinds of nodes in the wall and board dumps that may carry attachments. */
export type ContentKind = "post" | "comment" | "topic" | "brd_com";

export type ParentKind = ContentKind | "album" | "docs" | "group";

export type FileAttachmentKind = "photo" | "doc" | "album_photo" | "banner";

export type NoFileAttachmentKind = "video" | "audio" | "link";

/**
 * One file to fetch. `fileName` is relative to the directory of the
 * downloader batch the task is queued in.
 */
export interface DownloadTask {
  readonly parentKind: ParentKind;
  readonly parentId: number | null;
  readonly attachmentKind: FileAttachmentKind;
  readonly attachmentId: number;
  readonly sourceUrl: string;
  readonly fileName: string;
}

/** Attachment that has no retrievable binary, kept as a line of text. */
export interface NoFileRecord {
  readonly parentKind: ParentKind;
  readonly parentId: number | null;
  readonly attachmentKind: NoFileAttachmentKind;
  readonly text: string;
}

export interface DownloadSummary {
  requested: number;
  ok: number;
  failed: number;
  collisions: number;
}

export interface CollectionSummary {
  dumped: number;
  failed: number;
}
