import { z } from "zod";
import type { ApiTransport } from "./types";

const resolvedScreenNameSchema = z.object({
  object_id: z.number(),
  type: z.string().optional(),
});

/**
 * Turns a numeric id or a screen name into the negative owner id used for
 * communities by the wall, photo and document methods.
 */
export async function resolveOwnerId(ref: string, api: ApiTransport): Promise<number> {
  const trimmed = ref.trim();
  if (isNumericOwnerRef(trimmed)) {
    return -Math.abs(Number.parseInt(trimmed, 10));
  }

  const response = await api.call("utils.resolveScreenName", { screen_name: trimmed });
  const parsed = resolvedScreenNameSchema.safeParse(response);
  if (!parsed.success) {
    throw new Error(`Unable to resolve screen name: ${trimmed}`);
  }
  return -Math.abs(parsed.data.object_id);
}

export function isNumericOwnerRef(ref: string): boolean {
  return /^-?\d+$/.test(ref.trim());
}
