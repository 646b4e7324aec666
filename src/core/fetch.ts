import { Agent, fetch as undiciFetch } from "undici";
import type { RequestInit, Response } from "undici";

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: HttpFetch = (url, init) => undiciFetch(url, init);

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
