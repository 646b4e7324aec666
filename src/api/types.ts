export type ApiParamValue = string | number | boolean;

export type ApiParams = Record<string, ApiParamValue | undefined>;

/** Concatenation of every page of a paginated method. */
export interface PagedResult {
  count: number;
  items: unknown[];
}

export interface ApiTransport {
  call(method: string, params: ApiParams): Promise<unknown>;
  paginate(method: string, pageSize: number, params: ApiParams): Promise<PagedResult>;
}
