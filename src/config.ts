import { existsSync, readFileSync } from "node:fs";
import { logger } from "./logger";
import { publicKeyPath } from "./gerrit/session";
import type { BackoffConfig } from "./gerrit/backoff";

function getConfigPath(): string {
  return process.env.CONFIG_PATH || "./config.json";
}

export interface GerritConfig {
  host: string;
  port: number;
  username: string;
  privateKeyPath: string;
}

export interface UserConfig {
  name: string;
  gerritUsername: string;
}

export interface Config {
  gerrit: GerritConfig;
  users: Record<string, UserConfig>;
  dbPath: string;
  reconnect?: Partial<Omit<BackoffConfig, "maxAttempts">>;
}

const DEFAULT_GERRIT_PORT = 29418;

function parsePort(value: string | number | undefined): number {
  const port = typeof value === "number" ? value : parseInt(value ?? "", 10);
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_GERRIT_PORT;
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

export function loadConfig(): Config {
  let raw: Partial<Config> = {};
  try {
    raw = JSON.parse(readFileSync(getConfigPath(), "utf-8"));
  } catch (err) {
    if (!hasErrorCode(err, "ENOENT")) {
      logger.warn("failed to load config", { error: String(err) });
    }
  }

  return {
    gerrit: {
      host: process.env.GERRIT_HOST || raw.gerrit?.host || "",
      port: parsePort(process.env.GERRIT_PORT || raw.gerrit?.port),
      username: process.env.GERRIT_USERNAME || raw.gerrit?.username || "",
      privateKeyPath: process.env.GERRIT_PRIVATE_KEY || raw.gerrit?.privateKeyPath || "",
    },
    users: raw.users || {},
    dbPath: process.env.DB_PATH || raw.dbPath || "./gerrit-relay.db",
    reconnect: raw.reconnect,
  };
}

/** Chat user ids linked to the given Gerrit account. */
export function findChatUsers(config: Config, gerritUsername: string): string[] {
  return Object.entries(config.users)
    .filter(([_, user]) => user.gerritUsername === gerritUsername)
    .map(([userId]) => userId);
}

export function getGerritUsername(config: Config, chatUserId: string): string | undefined {
  return config.users[chatUserId]?.gerritUsername;
}

export function validateConfig(
  config: Config,
  fileExists: (path: string) => boolean = existsSync,
): { valid: boolean; issues: string[] } {
  const issues: string[] = [];
  const { gerrit } = config;

  if (!gerrit.host) issues.push("Gerrit host is not set (GERRIT_HOST)");
  if (!gerrit.username) issues.push("Gerrit username is not set (GERRIT_USERNAME)");
  if (!gerrit.privateKeyPath) {
    issues.push("SSH private key is not set (GERRIT_PRIVATE_KEY)");
  } else {
    if (!fileExists(gerrit.privateKeyPath)) {
      issues.push(`SSH private key ${gerrit.privateKeyPath} not found`);
    }
    const pubKey = publicKeyPath(gerrit.privateKeyPath);
    if (!fileExists(pubKey)) {
      issues.push(`SSH public key ${pubKey} not found`);
    }
  }

  if (Object.keys(config.users).length === 0) {
    issues.push("No users configured");
  }

  return { valid: issues.length === 0, issues };
}
