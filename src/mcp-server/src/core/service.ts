import { OPERATIONS, Operation, OperationContext, getOperation } from "../catalog/index.js";
import { createClientConfig, resolveBaseUrl } from "./base-url.js";
import { createCoreConfig } from "./config.js";
import { credentialsFromHeaders, isEmptySource, resolveCredentials } from "./credentials.js";
import { isConfigurationError } from "./errors.js";
import { SuperFakturaHttpClient } from "./http-client.js";
import { loadLoggingPolicy, loadPolicyList, loadRedactionFields, redactForLog, summarizeArgs, toolMatchesPolicy } from "./policy.js";
import { PayloadShapeValidator, loadPayloadShapes } from "./schema-validator.js";
import {
  CallContext,
  ClientConfig,
  CoreConfig,
  JsonObject,
  LoggingPolicy,
  PolicyList,
  ResultEnvelope,
} from "./types.js";
import {
  EnvSource,
  constantTimeEqual,
  formatLocalDate,
  httpError,
  isFailureEnvelope,
  isPlainObject,
  logInfo,
  logWarn,
} from "./utils.js";

export type SuperFakturaServiceOptions = {
  config?: Partial<CoreConfig>;
  env?: EnvSource;
  /** Source of "today" for date defaults. */
  clock?: () => Date;
};

export type MappedError = {
  status: number;
  message: string;
  details?: unknown;
};

function readErrorField(error: unknown, field: "statusCode" | "details"): unknown {
  if (!(error instanceof Error) || !(field in error)) return undefined;
  return Reflect.get(error, field);
}

export class SuperFakturaService {
  readonly config: CoreConfig;

  private readonly denylist: PolicyList;

  private readonly loggingPolicy: LoggingPolicy;

  private readonly redactionFields: Set<string>;

  private readonly shapes: PayloadShapeValidator;

  private readonly http: SuperFakturaHttpClient;

  private readonly clock: () => Date;

  private readonly defaultClient: ClientConfig | undefined;

  constructor(repoRoot: string, options: SuperFakturaServiceOptions = {}) {
    this.config = createCoreConfig(repoRoot, options.config ?? {}, options.env ?? process.env);

    this.denylist = loadPolicyList(this.config.repoRoot, "denylist.yaml");
    this.loggingPolicy = loadLoggingPolicy(this.config.repoRoot);
    this.redactionFields = loadRedactionFields(this.config.repoRoot);

    this.shapes = new PayloadShapeValidator(loadPayloadShapes(this.config.repoRoot));
    this.http = new SuperFakturaHttpClient({ timeoutMs: this.config.httpTimeoutMs });
    this.clock = options.clock ?? (() => new Date());
    this.defaultClient = this.loadDefaultClient();
  }

  get hasDefaultClient(): boolean {
    return this.defaultClient !== undefined;
  }

  requireServerKey(serverKeyHeader: string | undefined): void {
    if (!this.config.serverApiKey) return;
    const key = String(serverKeyHeader || "");
    if (!constantTimeEqual(key, this.config.serverApiKey)) {
      throw httpError(401, "Unauthorized: missing/invalid X-Server-Key.");
    }
  }

  redactForLog(value: unknown): unknown {
    return redactForLog(value, this.redactionFields);
  }

  mapErrorToHttp(e: unknown): MappedError {
    const statusCode = readErrorField(e, "statusCode");
    const details = readErrorField(e, "details");
    const message = e instanceof Error ? e.message : String(e);
    if (typeof statusCode === "number") {
      return { status: statusCode, message, details };
    }
    return { status: 500, message, details };
  }

  /** Operations visible under the current denylist and read-only setting. */
  allowedOperations(): Operation[] {
    return OPERATIONS.filter((op) => this.isToolAllowed(op));
  }

  /**
   * Context client first; then, when the call carries no credential headers, the process default;
   * otherwise per-field resolution of headers over environment defaults.
   */
  resolveClientConfig(context: CallContext = {}): ClientConfig {
    if (context.client) return context.client;

    const fromHeaders = credentialsFromHeaders(context.headers ?? {});
    if (isEmptySource(fromHeaders) && this.defaultClient) return this.defaultClient;

    return this.buildClientConfig(resolveCredentials(fromHeaders, this.config.credentialDefaults, this.config.moduleId));
  }

  async callTool(name: string, args: unknown, context: CallContext = {}): Promise<ResultEnvelope> {
    const op = getOperation(name);
    if (!op) throw httpError(404, `Unknown tool '${name}'.`);
    if (!this.isToolAllowed(op)) throw httpError(403, `Tool '${name}' is disabled by server policy.`);

    const startedAt = Date.now();
    const argSummary =
      this.config.logRequestPayloads && isPlainObject(args)
        ? summarizeArgs(name, args, this.loggingPolicy, this.redactionFields)
        : undefined;

    try {
      const client = this.resolveClientConfig(context);
      const result = await op.execute(this.operationContext(client), args);
      const logPayload: JsonObject = {
        tool: name,
        method: op.method,
        outcome: isFailureEnvelope(result) ? "failed" : "ok",
        durationMs: Date.now() - startedAt,
      };
      if (isFailureEnvelope(result)) logPayload.error = this.redactForLog(result.error);
      if (argSummary !== undefined) logPayload.request = argSummary;
      logInfo("superfaktura.tool", logPayload);
      return result;
    } catch (error) {
      const mapped = this.mapErrorToHttp(error);
      const logPayload: JsonObject = {
        tool: name,
        method: op.method,
        outcome: "error",
        status: mapped.status,
        error: mapped.message,
        durationMs: Date.now() - startedAt,
      };
      if (argSummary !== undefined) logPayload.request = argSummary;
      if (mapped.details !== undefined) logPayload.errorDetails = this.redactForLog(mapped.details);
      logInfo("superfaktura.tool", logPayload);
      throw error;
    }
  }

  logStartup(): void {
    logInfo("server.started", {
      transport: this.config.transport,
      host: this.config.host,
      port: this.config.port,
      mcpPath: this.config.mcpPath,
      healthPath: this.config.healthPath,
      readOnly: this.config.readOnly,
      toolCount: this.allowedOperations().length,
      denylistTools: this.denylist.toolNames.size,
      denylistGroups: this.denylist.groups.size,
      defaultClient: this.defaultClient !== undefined,
      mcpMaxSessions: this.config.mcpMaxSessions,
      mcpSessionTtlMs: this.config.mcpSessionTtlMs,
    });
  }

  private operationContext(client: ClientConfig): OperationContext {
    return {
      client,
      request: (method, endpoint, body) => this.http.execute(client, method, endpoint, body),
      today: () => formatLocalDate(this.clock()),
      shapes: this.shapes,
    };
  }

  private buildClientConfig(credentials: ClientConfig["credentials"]): ClientConfig {
    const baseUrl = resolveBaseUrl(this.config.apiUrl, credentials.country, {
      allowInsecureHttp: this.config.allowInsecureHttp,
    });
    return createClientConfig(baseUrl, credentials);
  }

  private loadDefaultClient(): ClientConfig | undefined {
    if (isEmptySource(this.config.credentialDefaults)) return undefined;
    try {
      return this.buildClientConfig(resolveCredentials({}, this.config.credentialDefaults, this.config.moduleId));
    } catch (error) {
      if (!isConfigurationError(error)) throw error;
      logWarn("superfaktura.default_client", { error: error.message });
      return undefined;
    }
  }

  private isToolAllowed(op: Operation): boolean {
    if (this.denylist.hasEntries && toolMatchesPolicy(op, this.denylist)) return false;
    return !this.config.readOnly || op.readOnly;
  }
}
