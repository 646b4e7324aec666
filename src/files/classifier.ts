import { parseAttachment } from "../types";
import type { Attachment, ContentKind, DownloadTask, NoFileRecord } from "../types";
import type { ContentNode } from "./contentNodes";
import { attachmentDocFileName, attachmentPhotoFileName, selectPhotoSize, urlExtension } from "./fileNames";

export type ClassifierWarning =
  | { code: "unsupported_kind"; parentKind: ContentKind; parentId: number; type: string }
  | { code: "empty_photo"; parentKind: ContentKind; parentId: number; attachmentId: number }
  | { code: "missing_url"; parentKind: ContentKind; parentId: number; attachmentId: number }
  | { code: "malformed_attachment"; parentKind: ContentKind; parentId: number; type: string; reason: string };

export interface ClassificationResult {
  tasks: DownloadTask[];
  records: NoFileRecord[];
  warnings: ClassifierWarning[];
}

/**
 * Routes attachments of content nodes to download tasks or no-file records.
 * One instance is one classification pass: each unsupported attachment type
 * is reported only the first time the pass meets it.
 */
export class AttachmentClassifier {
  private readonly skippedTypes = new Set<string>();

  get skipped(): ReadonlySet<string> {
    return this.skippedTypes;
  }

  classify(node: ContentNode): ClassificationResult {
    const result: ClassificationResult = { tasks: [], records: [], warnings: [] };

    for (const raw of node.attachments) {
      const parsed = parseAttachment(raw);
      if (!parsed.ok) {
        result.warnings.push({
          code: "malformed_attachment",
          parentKind: node.kind,
          parentId: node.id,
          type: parsed.type,
          reason: parsed.reason,
        });
        continue;
      }
      this.route(node, parsed.attachment, result);
    }

    return result;
  }

  classifyAll(nodes: readonly ContentNode[]): ClassificationResult {
    const combined: ClassificationResult = { tasks: [], records: [], warnings: [] };
    for (const node of nodes) {
      const result = this.classify(node);
      combined.tasks.push(...result.tasks);
      combined.records.push(...result.records);
      combined.warnings.push(...result.warnings);
    }
    return combined;
  }

  private route(node: ContentNode, attachment: Attachment, result: ClassificationResult): void {
    const parent = { parentKind: node.kind, parentId: node.id };

    switch (attachment.kind) {
      case "video":
        result.records.push({ ...parent, attachmentKind: "video", text: attachment.title });
        return;
      case "audio":
        result.records.push({ ...parent, attachmentKind: "audio", text: `${attachment.artist} — ${attachment.title}` });
        return;
      case "link":
        result.records.push({ ...parent, attachmentKind: "link", text: `${attachment.title} [${attachment.url}]` });
        return;
      case "photo": {
        const { photo } = attachment;
        const size = selectPhotoSize(photo.sizes);
        if (!size) {
          result.warnings.push({ code: "empty_photo", ...parent, attachmentId: photo.id });
          return;
        }
        result.tasks.push({
          ...parent,
          attachmentKind: "photo",
          attachmentId: photo.id,
          sourceUrl: size.url,
          fileName: attachmentPhotoFileName(node.kind, node.id, photo.id, urlExtension(size.url)),
        });
        return;
      }
      case "doc": {
        const { doc } = attachment;
        if (!doc.url) {
          result.warnings.push({ code: "missing_url", ...parent, attachmentId: doc.id });
          return;
        }
        result.tasks.push({
          ...parent,
          attachmentKind: "doc",
          attachmentId: doc.id,
          sourceUrl: doc.url,
          fileName: attachmentDocFileName(node.kind, node.id, doc.id, doc.title, doc.ext),
        });
        return;
      }
      case "other":
        if (!this.skippedTypes.has(attachment.type)) {
          this.skippedTypes.add(attachment.type);
          result.warnings.push({ code: "unsupported_kind", ...parent, type: attachment.type });
        }
        return;
      default: {
        const unreachable: never = attachment;
        throw new Error(`Unhandled attachment: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
