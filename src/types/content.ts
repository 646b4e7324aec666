import { z } from "zod";

// Shapes of the dumped API results read back by the files stage. Only the
// fields the archiver uses are declared; everything else is stripped.

export const photoSizeSchema = z.object({
  type: z.string(),
  url: z.string().default(""),
  width: z.number().optional(),
  height: z.number().optional(),
});

export const photoSchema = z.object({
  id: z.number(),
  sizes: z.array(photoSizeSchema).default([]),
});

export const docSchema = z.object({
  id: z.number(),
  title: z.string().default(""),
  ext: z.string().default(""),
  url: z.string().default(""),
});

export type PhotoSize = z.infer<typeof photoSizeSchema>;
export type Photo = z.infer<typeof photoSchema>;
export type Doc = z.infer<typeof docSchema>;

const attachmentHeadSchema = z.object({ type: z.string() });
const videoAttachmentSchema = z.object({ video: z.object({ title: z.string().default("") }) });
const audioAttachmentSchema = z.object({
  audio: z.object({ artist: z.string().default(""), title: z.string().default("") }),
});
const linkAttachmentSchema = z.object({ link: z.object({ title: z.string().default(""), url: z.string() }) });
const photoAttachmentSchema = z.object({ photo: photoSchema });
const docAttachmentSchema = z.object({ doc: docSchema });

export type Attachment =
  | { kind: "video"; title: string }
  | { kind: "audio"; artist: string; title: string }
  | { kind: "link"; title: string; url: string }
  | { kind: "photo"; photo: Photo }
  | { kind: "doc"; doc: Doc }
  | { kind: "other"; type: string };

export type AttachmentParseResult =
  | { ok: true; attachment: Attachment }
  | { ok: false; type: string; reason: string };

export function describeZodError(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

function invalid(type: string, error: z.ZodError): AttachmentParseResult {
  return { ok: false, type, reason: describeZodError(error) };
}

export function parseAttachment(raw: unknown): AttachmentParseResult {
  const head = attachmentHeadSchema.safeParse(raw);
  if (!head.success) {
    return invalid("unknown", head.error);
  }

  const { type } = head.data;
  switch (type) {
    case "video": {
      const parsed = videoAttachmentSchema.safeParse(raw);
      return parsed.success ? { ok: true, attachment: { kind: "video", title: parsed.data.video.title } } : invalid(type, parsed.error);
    }
    case "audio": {
      const parsed = audioAttachmentSchema.safeParse(raw);
      return parsed.success
        ? { ok: true, attachment: { kind: "audio", artist: parsed.data.audio.artist, title: parsed.data.audio.title } }
        : invalid(type, parsed.error);
    }
    case "link": {
      const parsed = linkAttachmentSchema.safeParse(raw);
      return parsed.success
        ? { ok: true, attachment: { kind: "link", title: parsed.data.link.title, url: parsed.data.link.url } }
        : invalid(type, parsed.error);
    }
    case "photo": {
      const parsed = photoAttachmentSchema.safeParse(raw);
      return parsed.success ? { ok: true, attachment: { kind: "photo", photo: parsed.data.photo } } : invalid(type, parsed.error);
    }
    case "doc": {
      const parsed = docAttachmentSchema.safeParse(raw);
      return parsed.success ? { ok: true, attachment: { kind: "doc", doc: parsed.data.doc } } : invalid(type, parsed.error);
    }
    default:
      return { ok: true, attachment: { kind: "other", type } };
  }
}

const attachmentsField = z.array(z.unknown()).default([]);

export const commentSchema = z.object({
  id: z.number(),
  attachments: attachmentsField,
});

const nestedItemsSchema = z.object({ items: z.array(z.unknown()) });

export const postSchema = commentSchema.extend({
  comments_list: nestedItemsSchema.optional(),
});

export const topicSchema = commentSchema.extend({
  topics_info: nestedItemsSchema.optional(),
});

export const albumSchema = z.object({
  id: z.number(),
  title: z.string().default(""),
  photos_list: nestedItemsSchema.optional(),
});

export const coverImageSchema = z.object({
  url: z.string(),
  width: z.number().default(0),
});

export const groupSchema = z.object({
  id: z.number().optional(),
  cover: z.object({ images: z.array(coverImageSchema).default([]) }).optional(),
});

/** `{ count, items }` as returned by every paginated method. */
export const listResultSchema = z.object({
  count: z.number().optional(),
  items: z.array(z.unknown()),
});
