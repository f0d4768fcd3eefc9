import { Agent, fetch as undiciFetch } from "undici";
import type { RequestInit, Response } from "undici";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

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

export const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);
