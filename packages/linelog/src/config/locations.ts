import path from "path";
import dotenv, { type DotenvPopulateInput } from "dotenv";
import {
  LogWriterConfig,
  LogWriterConfigInput,
  parseLogWriterConfig,
} from "@/log/config";
import { ConfigError } from "@/utils/errors";

export const ENV_FILENAME = ".env";
export const ENV_LOCAL_FILENAME = ".env.local";
export const DOT_LINELOG_DIR_NAME = ".linelog";
export const LOG_FILE_NAME = "linelog.log";

const LINELOG_ENV_PREFIX = "LINELOG_";
export const getLinelogEnvName = (key: string) => `${LINELOG_ENV_PREFIX}${key}`;

type Env = Record<string, string | undefined>;

/**
 * Resolves where the log file lives: `LINELOG_FILE` when set, otherwise
 * `.linelog/linelog.log` under the working directory.
 */
export const resolveLogFilePath = ({
  env = process.env,
  cwd = process.cwd(),
}: {
  env?: Env;
  cwd?: string;
} = {}): string => {
  const fromEnv = env[getLinelogEnvName("FILE")];
  if (fromEnv) {
    return path.resolve(cwd, fromEnv);
  }
  return path.join(cwd, DOT_LINELOG_DIR_NAME, LOG_FILE_NAME);
};

const parseBooleanEnv = (name: string, value: string): boolean => {
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigError(
        "invalid-env",
        `${name} must be a boolean (received: ${JSON.stringify(value)})`,
      );
  }
};

const parseIntegerEnv = (name: string, value: string): number => {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(
      "invalid-env",
      `${name} must be a positive integer (received: ${JSON.stringify(value)})`,
    );
  }
  return Number.parseInt(value, 10);
};

/**
 * Builds writer configuration from `.env` files, environment variables and
 * explicit overrides, in increasing order of precedence.
 *
 * Values already present in `env` are never replaced by the dotenv files.
 *
 * @throws {ConfigError} On malformed environment values or invalid config
 */
export const loadLogWriterConfig = ({
  configDir = process.cwd(),
  env = process.env,
  overrides = {},
}: {
  configDir?: string;
  env?: Env;
  overrides?: Partial<LogWriterConfigInput>;
} = {}): LogWriterConfig => {
  const processEnv: DotenvPopulateInput = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) processEnv[key] = value;
  }
  dotenv.config({ path: path.join(configDir, ENV_FILENAME), processEnv });
  dotenv.config({ path: path.join(configDir, ENV_LOCAL_FILENAME), processEnv });

  const fromEnv: Partial<LogWriterConfigInput> = {
    path: resolveLogFilePath({ env: processEnv, cwd: configDir }),
  };

  const thresholdName = getLinelogEnvName("FLUSH_THRESHOLD");
  const threshold = processEnv[thresholdName];
  if (threshold !== undefined) {
    fromEnv.flushThreshold = parseIntegerEnv(thresholdName, threshold);
  }

  const echoName = getLinelogEnvName("ECHO");
  const echo = processEnv[echoName];
  if (echo !== undefined) {
    fromEnv.echo = parseBooleanEnv(echoName, echo);
  }

  const explicit = Object.fromEntries(
    Object.entries(overrides).filter(([_, value]) => value !== undefined),
  );

  return parseLogWriterConfig({ ...fromEnv, ...explicit });
};
