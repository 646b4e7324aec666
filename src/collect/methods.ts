import type { ApiParams } from "../api";
import { enrichAlbums, enrichPages, enrichTopics, enrichWall } from "./enricher";
import type { Enricher } from "./enricher";

export interface MethodRequest {
  method: string;
  params: ApiParams;
  pageSize?: number;
  enrich?: Enricher;
}

const GROUP_FIELDS = [
  "activity",
  "ban_info",
  "can_post",
  "can_see_all_posts",
  "city",
  "contacts",
  "counters",
  "country",
  "cover",
  "description",
  "finish_date",
  "fixed_post",
  "links",
  "market",
  "members_count",
  "place",
  "site",
  "start_date",
  "status",
  "verified",
  "wiki_page",
];

/**
 * Top-level methods dumped for one community, in fetch order. `ownerId` is
 * negative; the `group_id` parameters take it positive.
 */
export function buildMethodRequests(ownerId: number, statsFromTimestamp?: number): MethodRequest[] {
  const groupId = Math.abs(ownerId);
  const requests: MethodRequest[] = [
    {
      method: "groups.getById",
      params: { group_id: groupId, fields: GROUP_FIELDS.join(",") },
    },
    {
      method: "wall.get",
      params: { owner_id: ownerId },
      pageSize: 100,
      enrich: enrichWall,
    },
    {
      method: "board.getTopics",
      params: { group_id: groupId },
      pageSize: 100,
      enrich: enrichTopics,
    },
    {
      method: "video.get",
      params: { owner_id: ownerId },
      pageSize: 100,
    },
    {
      method: "docs.get",
      params: { owner_id: ownerId },
      pageSize: 2000,
    },
    {
      method: "groups.getMembers",
      params: { group_id: groupId, sort: "id_asc" },
      pageSize: 1000,
    },
    {
      method: "pages.getTitles",
      params: { group_id: groupId },
      enrich: enrichPages,
    },
    {
      method: "photos.getAlbums",
      params: { owner_id: ownerId, need_system: 1, need_covers: 1 },
      enrich: enrichAlbums,
    },
  ];

  if (statsFromTimestamp !== undefined) {
    requests.push({
      method: "stats.get",
      params: { group_id: groupId, timestamp_from: statsFromTimestamp },
    });
  }

  return requests;
}
