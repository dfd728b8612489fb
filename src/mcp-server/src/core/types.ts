export type JsonObject = Record<string, unknown>;

export type HttpishError = Error & {
  statusCode?: number;
  details?: unknown;
};

/** Header map as delivered by Node and by the MCP transport (keys may arrive in any case). */
export type HeaderBag = Record<string, string | string[] | undefined>;

export type Credentials = {
  readonly email: string;
  readonly apiKey: string;
  readonly companyId?: string;
  readonly country: string;
  readonly moduleId: string;
};

/** Partially known credential values from one source (call context or process defaults). */
export type CredentialSource = {
  email?: string;
  apiKey?: string;
  companyId?: string;
  country?: string;
};

export type ClientConfig = {
  readonly baseUrl: string;
  readonly credentials: Credentials;
};

export type FailureEnvelope = {
  error: string;
  status: "failed";
};

/** Decoded response body relayed verbatim, or a FailureEnvelope. Narrow with isFailureEnvelope. */
export type ResultEnvelope = unknown;

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export type SortDirection = "ASC" | "DESC";

/** Everything a single tool call may carry besides its arguments. */
export type CallContext = {
  headers?: HeaderBag;
  client?: ClientConfig;
};

export type PolicyList = {
  toolNames: Set<string>;
  groups: Set<string>;
  hasEntries: boolean;
};

export type LoggingPolicyRule = {
  args: string[];
};

export type LoggingPolicy = {
  defaultRule: LoggingPolicyRule;
  toolRules: Map<string, LoggingPolicyRule>;
};

export type McpTransportKind = "http" | "stdio";

export type CoreConfig = {
  repoRoot: string;
  serverApiKey: string;
  readOnly: boolean;
  allowInsecureHttp: boolean;
  logRequestPayloads: boolean;
  httpTimeoutMs: number;
  moduleId: string;
  apiUrl?: string;
  credentialDefaults: CredentialSource;
  transport: McpTransportKind;
  mcpPath: string;
  healthPath: string;
  mcpMaxSessions: number;
  mcpSessionTtlMs: number;
  host: string;
  port: number;
};

