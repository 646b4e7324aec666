import fs from "node:fs";
import path from "node:path";
import { NOFILE_ATTACHMENTS_FILE } from "../store/paths";
import type { NoFileRecord } from "../types";

export function formatNoFileRecord(record: NoFileRecord): string {
  return `${record.parentKind}\t${record.parentId ?? ""}\t${record.attachmentKind}\t${record.text}\n`;
}

/**
 * Collects descriptions of attachments that have no file behind them and
 * writes them once, as tab-separated lines, when the pass is over.
 */
export class NoFileAttachmentSink {
  private readonly records: NoFileRecord[] = [];
  readonly outputPath: string;

  constructor(ownerDir: string) {
    this.outputPath = path.join(ownerDir, NOFILE_ATTACHMENTS_FILE);
  }

  add(...records: NoFileRecord[]): void {
    this.records.push(...records);
  }

  get size(): number {
    return this.records.length;
  }

  async flush(): Promise<string> {
    await fs.promises.mkdir(path.dirname(this.outputPath), { recursive: true });
    await fs.promises.writeFile(this.outputPath, this.records.map(formatNoFileRecord).join(""), "utf-8");
    return this.outputPath;
  }
}
