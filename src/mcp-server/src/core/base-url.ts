import { ConfigurationError } from "./errors.js";
import { ClientConfig, Credentials } from "./types.js";
import { isLoopbackHost } from "./utils.js";

export const BASE_URLS: Readonly<Record<string, string>> = Object.freeze({
  sk: "https://moja.superfaktura.sk",
  cz: "https://moje.superfaktura.cz",
  at: "https://meine.superfaktura.at",
  "sandbox-sk": "https://sandbox.superfaktura.sk",
  "sandbox-cz": "https://sandbox.superfaktura.cz",
});

export type BaseUrlOptions = {
  allowInsecureHttp?: boolean;
};

function assertUsableUrl(raw: string, options: BaseUrlOptions): void {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigurationError(`Invalid API URL: ${raw}`);
  }

  if (url.protocol === "https:") return;
  if (url.protocol === "http:" && options.allowInsecureHttp && isLoopbackHost(url.hostname)) return;
  throw new ConfigurationError(`API URL must use https (or loopback http with ALLOW_INSECURE_HTTP=true): ${raw}`);
}

/** An explicit URL wins and is returned as given; otherwise the country code picks the host. */
export function resolveBaseUrl(explicitUrl: string | undefined, country: string, options: BaseUrlOptions = {}): string {
  const explicit = explicitUrl?.trim();
  if (explicit) {
    assertUsableUrl(explicit, options);
    return explicit;
  }

  const code = country.trim().toLowerCase();
  const host = Object.prototype.hasOwnProperty.call(BASE_URLS, code) ? BASE_URLS[code] : undefined;
  if (!host) {
    throw new ConfigurationError(`Invalid country code: ${country}`, { country, supported: Object.keys(BASE_URLS) });
  }
  return host;
}

export function createClientConfig(baseUrl: string, credentials: Credentials): ClientConfig {
  return Object.freeze({ baseUrl, credentials });
}
