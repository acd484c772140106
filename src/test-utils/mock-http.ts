import axios, { AxiosError } from "axios";
import type {
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from "axios";

export type MockReply =
  | { status: number; data: unknown; statusText?: string; delayMs?: number }
  | { networkError: string };

export interface RecordedRequest {
  url: string;
  headers: Record<string, unknown>;
}

export interface MockHttp {
  http: AxiosInstance;
  requests: RecordedRequest[];
  maxInFlight: () => number;
}

/**
 * An axios instance whose adapter answers in-process. `route` maps a request
 * URL to a reply; statuses outside 2xx reject the way axios does.
 */
export function createMockHttp(route: (url: string) => MockReply): MockHttp {
  const requests: RecordedRequest[] = [];
  let inFlight = 0;
  let peak = 0;

  const http = axios.create({
    adapter: async (
      config: InternalAxiosRequestConfig
    ): Promise<AxiosResponse> => {
      const url = config.url ?? "";
      requests.push({ url, headers: config.headers.toJSON() });

      const reply = route(url);
      inFlight++;
      peak = Math.max(peak, inFlight);
      try {
        await new Promise((resolve) =>
          setTimeout(resolve, "delayMs" in reply ? reply.delayMs ?? 0 : 0)
        );
      } finally {
        inFlight--;
      }

      if ("networkError" in reply) {
        throw new AxiosError(reply.networkError, AxiosError.ERR_NETWORK, config);
      }

      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: reply.statusText ?? "",
        headers: {},
        config,
      };
      if (reply.status < 200 || reply.status >= 300) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response
        );
      }
      return response;
    },
  });

  return { http, requests, maxInFlight: () => peak };
}

export function priceCsv(rows: Array<[string, number]>): string {
  return [
    "date,close,high,low,open,volume,adjClose",
    ...rows.map(
      ([date, price]) =>
        `${date},${price},${price + 1},${price - 1},${price},1000,${price}`
    ),
  ].join("\n");
}
