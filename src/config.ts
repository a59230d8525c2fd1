import { parse } from "smol-toml";
import { readFileSync } from "fs";
import { resolve } from "path";

export interface BitbucketConfig {
  base_url: string;
  workspace: string;
}

export interface ServiceDeskConfig {
  base_url: string;
  insight_workspace_version: number;
}

export interface HttpConfig {
  timeout_ms: number;
  verbose: boolean;
}

export interface Config {
  bitbucket: BitbucketConfig;
  service_desk?: ServiceDeskConfig;
  http: HttpConfig;
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function section(parsed: Table, name: string): Table | undefined {
  const value = parsed[name];
  if (value === undefined) return undefined;
  if (!isTable(value)) throw new Error(`config.toml: [${name}] must be a table`);
  return value;
}

function readString(table: Table, sectionName: string, key: string, fallback?: string): string {
  const value = table[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== "string" || !value) {
    throw new Error(`config.toml: ${sectionName}.${key} must be a non-empty string`);
  }
  return value;
}

function readNumber(table: Table, sectionName: string, key: string, fallback: number): number {
  const value = table[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number") throw new Error(`config.toml: ${sectionName}.${key} must be a number`);
  return value;
}

function readBoolean(table: Table, sectionName: string, key: string, fallback: boolean): boolean {
  const value = table[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw new Error(`config.toml: ${sectionName}.${key} must be true or false`);
  return value;
}

export function loadConfig(configPath?: string): Config {
  const p = configPath ?? resolve(process.cwd(), "config.toml");
  const raw = readFileSync(p, "utf-8");
  const parsed: Table = parse(raw);

  const bb = section(parsed, "bitbucket") ?? {};
  const sd = section(parsed, "service_desk");
  const http = section(parsed, "http") ?? {};

  const config: Config = {
    bitbucket: {
      base_url: readString(bb, "bitbucket", "base_url", "https://bitbucket.org").replace(/\/+$/, ""),
      workspace: readString(bb, "bitbucket", "workspace", ""),
    },
    http: {
      timeout_ms: readNumber(http, "http", "timeout_ms", 30_000),
      verbose: readBoolean(http, "http", "verbose", false),
    },
  };

  if (sd) {
    config.service_desk = {
      base_url: readString(sd, "service_desk", "base_url").replace(/\/+$/, ""),
      insight_workspace_version: readNumber(sd, "service_desk", "insight_workspace_version", 1),
    };
  }

  return config;
}

/**
 * Derive the REST API root from the browser URL.
 */
export function buildBitbucketApiUrl(config: Config): string {
  return config.bitbucket.base_url.replace("://bitbucket.org", "://api.bitbucket.org/2.0");
}

/**
 * Build a Bitbucket pull request URL.
 */
export function buildBitbucketPullRequestUrl(config: Config, repoSlug: string, prId: number): string {
  const bb = config.bitbucket;
  return `${bb.base_url}/${bb.workspace}/${repoSlug}/pull-requests/${prId}`;
}
