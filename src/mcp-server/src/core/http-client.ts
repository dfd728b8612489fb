import axios, { AxiosInstance } from "axios";

import { ClientConfig, Credentials, HttpMethod, ResultEnvelope } from "./types.js";
import { failureEnvelope } from "./utils.js";

export const REQUEST_TIMEOUT_MS = 30_000;

export function buildAuthorizationHeader(credentials: Credentials): string {
  const pairs = [
    `email=${encodeURIComponent(credentials.email)}`,
    `apikey=${encodeURIComponent(credentials.apiKey)}`,
    `module=${credentials.moduleId}`,
  ];
  if (credentials.companyId !== undefined) pairs.push(`company_id=${credentials.companyId}`);
  return `SFAPI ${pairs.join("&")}`;
}

export function joinUrl(baseUrl: string, endpoint: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${endpoint.replace(/^\/+/, "")}`;
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The body arrives as text so that a JSON string and an unparsable body stay distinguishable. */
function decodeBody(text: string, endpoint: string): ResultEnvelope {
  try {
    const decoded: unknown = JSON.parse(text);
    return decoded;
  } catch {
    return failureEnvelope(`Response from ${endpoint} is not valid JSON.`);
  }
}

export type HttpClientOptions = {
  timeoutMs?: number;
};

/**
 * Executes authenticated calls and folds every remote outcome into one envelope. Nothing in here
 * throws for network, timeout or HTTP status failures.
 */
export class SuperFakturaHttpClient {
  private readonly http: AxiosInstance;

  constructor(options: HttpClientOptions = {}) {
    this.http = axios.create({ timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS });
  }

  async execute(client: ClientConfig, method: HttpMethod, endpoint: string, body?: unknown): Promise<ResultEnvelope> {
    try {
      const resp = await this.http.request<string>({
        method,
        url: joinUrl(client.baseUrl, endpoint),
        headers: {
          Authorization: buildAuthorizationHeader(client.credentials),
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        data: body === undefined ? undefined : JSON.stringify(body),
        responseType: "text",
      });
      return decodeBody(resp.data, endpoint);
    } catch (error) {
      return failureEnvelope(describeFailure(error));
    }
  }
}
