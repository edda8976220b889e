import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";

import { ConfigurationError } from "./errors";
import { LOG_LEVELS } from "./utils/logger";
import type {
  DeliveryClientConfig,
  DeliveryClientInit,
  Identifier,
  LogLevel,
} from "./types";

export const DEFAULT_API_URL = "https://delivery.yandex.ru/api";
export const DEFAULT_API_VERSION = "1.0";
export const DEFAULT_USER_AGENT = "delivery-client/0.1.0 (node)";

type PartialInit = Partial<DeliveryClientInit>;

function readYaml(filePath: string): Record<string, unknown> {
  const abs = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(abs)) return {};

  let parsed: unknown;
  try {
    parsed = yaml.parse(fs.readFileSync(abs, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to parse config file ${abs}`, {
      cause: error,
    });
  }
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config file ${abs} must contain a mapping`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

function readEnv(env: NodeJS.ProcessEnv): PartialInit {
  const logLevel = env["DELIVERY_LOG_LEVEL"];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigurationError(`Unknown DELIVERY_LOG_LEVEL "${logLevel}"`);
  }

  const clientId = env["DELIVERY_CLIENT_ID"];
  const senderId = env["DELIVERY_SENDER_ID"];
  const apiUrl = env["DELIVERY_API_URL"];

  return {
    ...(clientId ? { clientId } : {}),
    ...(senderId ? { senderId } : {}),
    ...(apiUrl ? { apiUrl } : {}),
    ...(logLevel ? { logLevel } : {}),
  };
}

function requireIdentifier(value: unknown, field: string): Identifier {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") return value;
  throw new ConfigurationError(`${field} is required`);
}

function identifierList(value: unknown, field: string): readonly Identifier[] {
  if (value === undefined || value === null) return Object.freeze([]);
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${field} must be a list`);
  }
  return Object.freeze(
    value.map((v: unknown, i: number) => requireIdentifier(v, `${field}[${i}]`))
  );
}

function methodKeyMap(value: unknown): Readonly<Record<string, string>> {
  if (value === undefined || value === null) return Object.freeze({});
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigurationError("methodKeys must be a mapping");
  }
  const out: Record<string, string> = {};
  for (const [method, key] of Object.entries(value)) {
    if (typeof key !== "string") {
      throw new ConfigurationError(`methodKeys.${method} must be a string`);
    }
    out[method] = key;
  }
  return Object.freeze(out);
}

function nonEmptyString(value: unknown, field: string): string {
  if (typeof value !== "string" || value === "") {
    throw new ConfigurationError(`${field} must be a non-empty string`);
  }
  return value;
}

/**
 * Resolves the client configuration.
 *
 * Precedence, lowest first: defaults, the YAML file named by
 * `DELIVERY_CLIENT_RC`, `DELIVERY_*` environment variables, `userCfg`.
 * The result is frozen.
 *
 * @throws {ConfigurationError} when a required value is missing or invalid
 */
export function loadConfig(
  userCfg: PartialInit = {},
  env: NodeJS.ProcessEnv = process.env
): DeliveryClientConfig {
  const rcPath = env["DELIVERY_CLIENT_RC"];
  const userSet = Object.fromEntries(
    Object.entries(userCfg).filter(([, v]) => v !== undefined)
  );
  const fileCfg = rcPath ? readYaml(rcPath) : {};

  const merged: Record<string, unknown> = {
    apiUrl: DEFAULT_API_URL,
    apiVersion: DEFAULT_API_VERSION,
    userAgent: DEFAULT_USER_AGENT,
    logLevel: "info",
    ...fileCfg,
    ...readEnv(env),
    ...userSet,
  };

  const logLevel = merged["logLevel"];
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`Unknown logLevel "${String(logLevel)}"`);
  }

  return Object.freeze({
    clientId: requireIdentifier(merged["clientId"], "clientId"),
    senderId: requireIdentifier(merged["senderId"], "senderId"),
    warehouseIds: identifierList(merged["warehouseIds"], "warehouseIds"),
    requisiteIds: identifierList(merged["requisiteIds"], "requisiteIds"),
    methodKeys: methodKeyMap(merged["methodKeys"]),
    apiUrl: nonEmptyString(merged["apiUrl"], "apiUrl").replace(/\/+$/, ""),
    apiVersion: nonEmptyString(merged["apiVersion"], "apiVersion"),
    userAgent: nonEmptyString(merged["userAgent"], "userAgent"),
    logLevel,
  });
}
