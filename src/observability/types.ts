export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  method?: string;
  ownerId?: number;
  url?: string;
  parentKind?: string;
  parentId?: number | null;
  attachmentId?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "api_calls"
  | "api_rate_limited"
  | "page_size_reductions"
  | "methods_dumped"
  | "methods_failed"
  | "downloads_ok"
  | "downloads_failed"
  | "nofile_records"
  | "attachments_skipped";

export type MetricTimerName = "api_call_ms" | "method_ms" | "download_ms";
