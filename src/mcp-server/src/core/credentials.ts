import { ConfigurationError } from "./errors.js";
import { CredentialSource, Credentials, HeaderBag } from "./types.js";
import { EnvSource, readStringEnv } from "./utils.js";

export const DEFAULT_COUNTRY = "sk";

export const DEFAULT_MODULE_ID = "superfaktura-mcp";

export const CREDENTIAL_HEADERS = {
  email: "x-superfaktura-email",
  apiKey: "x-superfaktura-api-key",
  companyId: "x-superfaktura-company-id",
  country: "x-superfaktura-country",
} as const;

export const CREDENTIAL_ENV = {
  email: "SUPERFAKTURA_EMAIL",
  apiKey: "SUPERFAKTURA_API_KEY",
  companyId: "SUPERFAKTURA_COMPANY_ID",
  country: "SUPERFAKTURA_COUNTRY",
} as const;

type CredentialField = keyof typeof CREDENTIAL_HEADERS;

const CREDENTIAL_FIELDS: CredentialField[] = ["email", "apiKey", "companyId", "country"];

function normalize(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function readHeader(headers: HeaderBag, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    const first = Array.isArray(value) ? value[0] : value;
    const normalized = normalize(first);
    if (normalized !== undefined) return normalized;
  }
  return undefined;
}

export function credentialsFromHeaders(headers: HeaderBag): CredentialSource {
  const source: CredentialSource = {};
  for (const field of CREDENTIAL_FIELDS) {
    const value = readHeader(headers, CREDENTIAL_HEADERS[field]);
    if (value !== undefined) source[field] = value;
  }
  return source;
}

export function credentialsFromEnv(env: EnvSource = process.env): CredentialSource {
  const source: CredentialSource = {};
  for (const field of CREDENTIAL_FIELDS) {
    const value = readStringEnv(CREDENTIAL_ENV[field], env);
    if (value !== undefined) source[field] = value;
  }
  return source;
}

export function isEmptySource(source: CredentialSource): boolean {
  return CREDENTIAL_FIELDS.every((field) => normalize(source[field]) === undefined);
}

/**
 * Resolves each field independently: call context first, then process defaults, then (country
 * only) the built-in fallback.
 */
export function resolveCredentials(
  context: CredentialSource = {},
  defaults: CredentialSource = {},
  moduleId: string = DEFAULT_MODULE_ID,
): Credentials {
  const pick = (field: CredentialField): string | undefined => normalize(context[field]) ?? normalize(defaults[field]);

  const email = pick("email");
  const apiKey = pick("apiKey");
  const missing: string[] = [];
  if (email === undefined) missing.push("email");
  if (apiKey === undefined) missing.push("apiKey");
  if (email === undefined || apiKey === undefined) {
    throw new ConfigurationError(
      `Missing SuperFaktura credentials: ${missing.join(", ")}. Send ${CREDENTIAL_HEADERS.email} / ${CREDENTIAL_HEADERS.apiKey} headers or set ${CREDENTIAL_ENV.email} / ${CREDENTIAL_ENV.apiKey}.`,
      { missing },
    );
  }

  const companyId = pick("companyId");
  const credentials: Credentials = {
    email,
    apiKey,
    country: pick("country") ?? DEFAULT_COUNTRY,
    moduleId,
    ...(companyId !== undefined ? { companyId } : {}),
  };
  return Object.freeze(credentials);
}
