import crypto from "node:crypto";

import { FailureEnvelope, HttpishError, JsonObject } from "./types.js";

export type EnvSource = Record<string, string | undefined>;

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function readStringEnv(name: string, env: EnvSource = process.env): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed ? trimmed : undefined;
}

export function readBoolEnv(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const raw = env[name];
  if (raw === undefined) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function readIntEnv(name: string, defaultValue: number, min: number, max: number, env: EnvSource = process.env): number {
  const raw = env[name];
  if (!raw || !raw.trim()) return defaultValue;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return defaultValue;
  return clamp(Math.trunc(parsed), min, max);
}

export function isLoopbackHost(hostname: string): boolean {
  const h = hostname.toLowerCase();
  return h === "localhost" || h === "127.0.0.1" || h === "::1" || h === "[::1]";
}

export function isPlainObject(v: unknown): v is JsonObject {
  if (v === null || typeof v !== "object") return false;
  const proto = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

/** Unset means undefined or null; falsy values such as 0, false and "" are still set. */
export function isSet(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/** Set and, for strings, not blank. */
export function isFilled(value: unknown): boolean {
  if (!isSet(value)) return false;
  return typeof value !== "string" || value.trim() !== "";
}

export function httpError(statusCode: number, message: string, details?: unknown): HttpishError {
  const err: HttpishError = Object.assign(new Error(message), { statusCode });
  if (details !== undefined) err.details = details;
  return err;
}

export function failureEnvelope(message: string): FailureEnvelope {
  return { error: message, status: "failed" };
}

export function isFailureEnvelope(value: unknown): value is FailureEnvelope {
  return isPlainObject(value) && value.status === "failed" && typeof value.error === "string";
}

export function constantTimeEqual(lhs: string, rhs: string): boolean {
  const left = Buffer.from(lhs);
  const right = Buffer.from(rhs);
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}

/** Local calendar date as YYYY-MM-DD. */
export function formatLocalDate(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, "0");
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

type LogLevel = "info" | "warn" | "error";

let logStream: "stdout" | "stderr" = "stdout";

// stdio transport owns stdout for protocol frames, so logs move to stderr there.
export function configureLogStream(stream: "stdout" | "stderr"): void {
  logStream = stream;
}

function writeLog(level: LogLevel, event: string, data: JsonObject): void {
  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    event,
    ...data,
  });
  if (logStream === "stderr") console.error(line);
  else console.log(line);
}

export function logInfo(event: string, data: JsonObject = {}): void {
  writeLog("info", event, data);
}

export function logWarn(event: string, data: JsonObject = {}): void {
  writeLog("warn", event, data);
}

export function logError(event: string, data: JsonObject = {}): void {
  writeLog("error", event, data);
}
