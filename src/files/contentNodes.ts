import { commentSchema, describeZodError, listResultSchema, postSchema, topicSchema } from "../types";
import type { ContentKind } from "../types";

export interface ContentNode {
  readonly kind: ContentKind;
  readonly id: number;
  readonly attachments: readonly unknown[];
}

export interface ContentWalkIssue {
  kind: ContentKind;
  reason: string;
}

export interface ContentWalk {
  nodes: ContentNode[];
  issues: ContentWalkIssue[];
}

export function itemsOf(dump: unknown): unknown[] {
  const parsed = listResultSchema.safeParse(dump);
  return parsed.success ? parsed.data.items : [];
}

function pushComments(walk: ContentWalk, kind: "comment" | "brd_com", rawComments: unknown[]): void {
  for (const rawComment of rawComments) {
    const comment = commentSchema.safeParse(rawComment);
    if (!comment.success) {
      walk.issues.push({ kind, reason: describeZodError(comment.error) });
      continue;
    }
    walk.nodes.push({ kind, id: comment.data.id, attachments: comment.data.attachments });
  }
}

/**
 * Flattens the wall and board dumps depth-first: each post followed by its
 * comments, then each topic followed by its comments.
 */
export function collectContentNodes(wall: unknown, board: unknown): ContentWalk {
  const walk: ContentWalk = { nodes: [], issues: [] };

  for (const rawPost of itemsOf(wall)) {
    const post = postSchema.safeParse(rawPost);
    if (!post.success) {
      walk.issues.push({ kind: "post", reason: describeZodError(post.error) });
      continue;
    }
    walk.nodes.push({ kind: "post", id: post.data.id, attachments: post.data.attachments });
    pushComments(walk, "comment", post.data.comments_list?.items ?? []);
  }

  for (const rawTopic of itemsOf(board)) {
    const topic = topicSchema.safeParse(rawTopic);
    if (!topic.success) {
      walk.issues.push({ kind: "topic", reason: describeZodError(topic.error) });
      continue;
    }
    walk.nodes.push({ kind: "topic", id: topic.data.id, attachments: topic.data.attachments });
    pushComments(walk, "brd_com", topic.data.topics_info?.items ?? []);
  }

  return walk;
}
