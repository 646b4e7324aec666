import path from "node:path";

export function ownerDirName(ownerId: number): string {
  return `data_club${Math.abs(ownerId)}`;
}

export function methodResultFileName(ownerId: number, method: string): string {
  return `club${Math.abs(ownerId)}_${method.replace(/\./g, "_")}.json`;
}

export function ownerDataDir(dataRoot: string, ownerId: number): string {
  return path.resolve(dataRoot, ownerDirName(ownerId));
}

export const ATTACHMENTS_DIR = "attachments";
export const NOFILE_ATTACHMENTS_FILE = "attachments.txt";
export const PHOTOS_DIR = "photos";
export const DOCS_DIR = "docs";
