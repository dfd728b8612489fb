import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { JsonObject, LoggingPolicy, LoggingPolicyRule, PolicyList } from "./types.js";
import { isPlainObject } from "./utils.js";

const DEFAULT_REDACTION_FIELDS = [
  "authorization",
  "apikey",
  "api_key",
  "apiKey",
  "x-superfaktura-api-key",
  "token",
  "secret",
  "password",
];

function normalizeYamlList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((v): v is string => typeof v === "string")
    .map((v) => v.trim())
    .filter((v) => !!v);
}

function readYamlOrDefault(filePath: string, defaultValue: unknown): unknown {
  if (!fs.existsSync(filePath)) return defaultValue;
  const text = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = parseYaml(text);
  return parsed ?? defaultValue;
}

export function loadPolicyList(repoRoot: string, fileName: string): PolicyList {
  const yamlPath = path.join(repoRoot, "registry", fileName);
  const rows = normalizeYamlList(readYamlOrDefault(yamlPath, []));

  const toolNames = new Set<string>();
  const groups = new Set<string>();
  for (const row of rows) {
    if (row.toLowerCase().startsWith("group:")) {
      const group = row.slice(6).trim().toLowerCase();
      if (group) groups.add(group);
      continue;
    }
    toolNames.add(row);
  }

  return {
    toolNames,
    groups,
    hasEntries: toolNames.size > 0 || groups.size > 0,
  };
}

export function loadSimpleList(repoRoot: string, fileName: string): Set<string> {
  const yamlPath = path.join(repoRoot, "registry", fileName);
  const rows = normalizeYamlList(readYamlOrDefault(yamlPath, []));
  return new Set(rows.map((x) => x.toLowerCase()));
}

function normalizeRule(value: unknown): LoggingPolicyRule {
  if (!isPlainObject(value)) return { args: [] };
  return { args: normalizeYamlList(value.args) };
}

export function loadLoggingPolicy(repoRoot: string): LoggingPolicy {
  const yamlPath = path.join(repoRoot, "registry", "logging-policy.yaml");
  const parsed = readYamlOrDefault(yamlPath, {});
  if (!isPlainObject(parsed)) {
    return { defaultRule: { args: [] }, toolRules: new Map() };
  }

  const defaultRule = normalizeRule(parsed.default);
  const toolRules = new Map<string, LoggingPolicyRule>();

  if (isPlainObject(parsed.operations)) {
    for (const [toolName, rule] of Object.entries(parsed.operations)) {
      toolRules.set(toolName, normalizeRule(rule));
    }
  }

  return { defaultRule, toolRules };
}

export function toolMatchesPolicy(tool: { name: string; group: string }, policy: PolicyList): boolean {
  if (policy.toolNames.has(tool.name)) return true;
  return policy.groups.has(tool.group.toLowerCase());
}

export function loadRedactionFields(repoRoot: string): Set<string> {
  const extra = [...loadSimpleList(repoRoot, "pii-redaction.yaml")];
  return new Set([...DEFAULT_REDACTION_FIELDS.map((x) => x.toLowerCase()), ...extra]);
}

function scrubText(text: string): string {
  return text.replace(/(apikey=)[^&\s"]+/gi, "$1***redacted***");
}

export function redactForLog(value: unknown, redactionFields: Set<string>): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") {
    const scrubbed = scrubText(value);
    return scrubbed.length > 120 ? `${scrubbed.slice(0, 117)}...` : scrubbed;
  }
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((x) => redactForLog(x, redactionFields));
  if (!isPlainObject(value)) return "[non-plain-object]";

  const out: JsonObject = {};
  for (const [k, v] of Object.entries(value)) {
    const key = k.toLowerCase();
    const shouldRedact = redactionFields.has(key) || key.includes("secret") || key.includes("token") || key.includes("password");
    out[k] = shouldRedact ? "***redacted***" : redactForLog(v, redactionFields);
  }
  return out;
}

export function summarizeArgs(
  toolName: string,
  args: JsonObject | undefined,
  loggingPolicy: LoggingPolicy,
  redactionFields: Set<string>,
): JsonObject {
  const rule = loggingPolicy.toolRules.get(toolName) ?? loggingPolicy.defaultRule;
  const summary: JsonObject = {};
  if (rule.args.length === 0) return summary;

  const picked: JsonObject = {};
  const source = args ?? {};
  for (const key of rule.args) {
    if (key in source) {
      picked[key] = source[key];
    }
  }
  summary.args = redactForLog(picked, redactionFields);
  return summary;
}
