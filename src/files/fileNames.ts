import path from "node:path";
import type { ParentKind, PhotoSize } from "../types";

// Lower rank wins. The letters encode a fixed quality order of VK photo
// sizes and are trusted over the declared width and height.
export const PHOTO_SIZE_RANKS: ReadonlyMap<string, number> = new Map([
  ["w", 0],
  ["z", 1],
  ["y", 2],
  ["x", 3],
  ["r", 4],
  ["q", 5],
  ["p", 6],
  ["o", 7],
  ["m", 8],
  ["s", 9],
]);

const ALLOWED_PUNCTUATION = new Set([" ", "_", "-", "—", ".", ","]);
const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;

export function selectPhotoSize(sizes: readonly PhotoSize[]): PhotoSize | undefined {
  let best: PhotoSize | undefined;
  let bestRank = Number.POSITIVE_INFINITY;
  for (const size of sizes) {
    if (!size.url) {
      continue;
    }
    const rank = PHOTO_SIZE_RANKS.get(size.type) ?? Number.POSITIVE_INFINITY;
    if (best === undefined || rank < bestRank) {
      best = size;
      bestRank = rank;
    }
  }
  return best;
}

/** Extension of the URL path, query and fragment excluded. */
export function urlExtension(url: string): string {
  const pathname = URL.canParse(url) ? new URL(url).pathname : url.split(/[?#]/, 1)[0];
  return path.posix.extname(pathname);
}

export function normalizeFileName(name: string): string {
  return Array.from(name)
    .filter((char) => ALPHANUMERIC.test(char) || ALLOWED_PUNCTUATION.has(char))
    .join("")
    .trimEnd();
}

export function withExtension(title: string, ext: string): string {
  if (!ext) {
    return title;
  }
  const suffix = `.${ext}`;
  return title.endsWith(suffix) ? title : `${title}${suffix}`;
}

export function docTitleFileName(title: string, ext: string): string {
  return withExtension(normalizeFileName(title), normalizeFileName(ext));
}

export function attachmentPhotoFileName(parentKind: ParentKind, parentId: number, photoId: number, ext: string): string {
  return `${parentKind}${parentId}_photo${photoId}${ext}`;
}

export function attachmentDocFileName(
  parentKind: ParentKind,
  parentId: number,
  docId: number,
  title: string,
  ext: string,
): string {
  return `${parentKind}${parentId}_doc${docId}_${docTitleFileName(title, ext)}`;
}

export function albumPhotoFileName(albumId: number, photoId: number, ext: string): string {
  return `a${albumId}_p${photoId}${ext}`;
}

export function libraryDocFileName(docId: number, title: string, ext: string): string {
  return `doc${docId}_${docTitleFileName(title, ext)}`;
}

/** Directory name for an album; falls back to the id when the title normalizes to nothing usable. */
export function albumDirName(albumId: number, title: string): string {
  const normalized = normalizeFileName(title);
  return /^\.*$/.test(normalized) ? `album${albumId}` : normalized;
}
