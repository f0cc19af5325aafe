import dotenv from "dotenv";
import path from "path";
import { ConfigError } from "./errors";

export type ParserProvider = "anthropic" | "heuristic";

export interface AppConfig {
  gmail: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    refreshToken: string;
    label: string;
  };
  notion: {
    token: string;
    databaseId: string;
  };
  parser: {
    provider: ParserProvider;
    anthropicApiKey?: string;
    model: string;
  };
  pipeline: {
    lookbackMonths: number;
    bufferSize: number;
    subjectKeywords?: string[];
    failureReportPath: string;
  };
  cron: {
    schedule?: string;
  };
}

type Env = Record<string, string | undefined>;

export const DEFAULT_REDIRECT_URI = "http://localhost:3000/oauth2callback";

export function loadDotenv(): void {
  dotenv.config({ path: path.resolve(__dirname, "../../.env") });
}

function required(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function integer(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function list(env: Env, key: string): string[] | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function parserProvider(env: Env): ParserProvider {
  const raw = env.PARSER_PROVIDER?.trim().toLowerCase();
  if (!raw) return env.ANTHROPIC_API_KEY ? "anthropic" : "heuristic";
  if (raw === "anthropic" || raw === "heuristic") return raw;
  throw new ConfigError(
    `PARSER_PROVIDER must be "anthropic" or "heuristic", got "${raw}"`
  );
}

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = parserProvider(env);

  return {
    gmail: {
      clientId: required(env, "GMAIL_CLIENT_ID"),
      clientSecret: required(env, "GMAIL_CLIENT_SECRET"),
      redirectUri: env.GMAIL_REDIRECT_URI || DEFAULT_REDIRECT_URI,
      refreshToken: required(env, "GMAIL_REFRESH_TOKEN"),
      label: env.GMAIL_LABEL || "INBOX",
    },
    notion: {
      token: required(env, "NOTION_TOKEN"),
      databaseId: required(env, "NOTION_DATABASE_ID"),
    },
    parser: {
      provider,
      anthropicApiKey:
        provider === "anthropic"
          ? required(env, "ANTHROPIC_API_KEY")
          : env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL || "claude-3-5-haiku-latest",
    },
    pipeline: {
      lookbackMonths: integer(env, "LOOKBACK_MONTHS", 4, 1),
      bufferSize: integer(env, "PIPELINE_BUFFER_SIZE", 0, 0),
      subjectKeywords: list(env, "JOB_SUBJECT_KEYWORDS"),
      failureReportPath:
        env.FAILURE_REPORT_PATH || "unparsed/unparsed_emails.csv",
    },
    cron: {
      schedule: env.CRON_SCHEDULE || undefined,
    },
  };
}
