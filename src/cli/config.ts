/**
 * Configuration management for bob
 * Functional library for loading and persisting the user's config file
 */

import * as fs from "fs/promises";
import * as path from "path";

import Ajv from "ajv";
import addFormats from "ajv-formats";
import { parse as parseToml, stringify as stringifyToml } from "smol-toml";

import { UserInputError, errorMessage, isErrnoException } from "@/cli/errors.js";
import { warn } from "@/cli/logger.js";
import { getConfigDir } from "@/utils/path.js";

export type ConfigFormat = "json" | "toml";

/**
 * Unified configuration type for bob
 * Contains every recognised option plus the file it was read from
 */
export type Config = {
  configPath: string;
  /** Print the commit log between nightly updates */
  enableNightlyInfo: boolean;
  /** Build with Release instead of RelWithDebInfo, and build nightly from source */
  enableReleaseBuild: boolean;
  downloadsLocation: string | null;
  installationLocation: string | null;
  versionSyncFileLocation: string | null;
  githubMirror: string | null;
  rollbackLimit: number;
  /** null means the user has not decided yet */
  addNeovimBinaryToPath: boolean | null;
};

/**
 * Raw disk config type - the document on disk before transformation
 */
type RawDiskConfig = {
  enable_nightly_info?: boolean;
  enable_release_build?: boolean;
  downloads_location?: string;
  installation_location?: string;
  version_sync_file_location?: string;
  github_mirror?: string;
  rollback_limit?: number;
  add_neovim_binary_to_path?: boolean;
};

export type ConfigKey = keyof RawDiskConfig;

// JSON schema for the config file - single source of truth for validation
const configSchema = {
  type: "object",
  properties: {
    enable_nightly_info: { type: "boolean", default: true },
    enable_release_build: { type: "boolean", default: false },
    downloads_location: { type: "string" },
    installation_location: { type: "string" },
    version_sync_file_location: { type: "string" },
    github_mirror: { type: "string", format: "uri-reference" },
    rollback_limit: { type: "integer", minimum: 0, maximum: 255, default: 3 },
    add_neovim_binary_to_path: { type: "boolean" },
  },
  additionalProperties: false,
};

const ajv = new Ajv({
  allErrors: true,
  useDefaults: true,
  removeAdditional: true,
});
addFormats(ajv);

const validateConfigSchema = ajv.compile<RawDiskConfig>(configSchema);

const ENV_TOKEN = /\$([A-Z_]+)/g;

/**
 * Get the path to the config file
 * @param args - Configuration arguments
 * @param args.env - Environment to read BOB_CONFIG and directories from
 *
 * @returns $BOB_CONFIG, else config.toml if present, else config.json
 */
export const getConfigPath = async (args: {
  env: NodeJS.ProcessEnv;
}): Promise<string> => {
  const { env } = args;

  if (env.BOB_CONFIG != null && env.BOB_CONFIG !== "") {
    return env.BOB_CONFIG;
  }

  const bobConfigDir = path.join(getConfigDir({ env }), "bob");
  const tomlPath = path.join(bobConfigDir, "config.toml");
  try {
    await fs.access(tomlPath);
    return tomlPath;
  } catch {
    return path.join(bobConfigDir, "config.json");
  }
};

/**
 * @param configPath - Path to the config file
 *
 * @returns toml for *.toml files, json otherwise
 */
export const getConfigFormat = (configPath: string): ConfigFormat => {
  return path.extname(configPath).toLowerCase() === ".toml" ? "toml" : "json";
};

/**
 * Replace every $VAR token with the value of that environment variable
 * Unset variables are left in place
 * @param args - Expansion arguments
 * @param args.value - Raw string from the config file
 * @param args.env - Environment to read from
 *
 * @returns The expanded string
 */
export const expandEnvVars = (args: {
  value: string;
  env: NodeJS.ProcessEnv;
}): string => {
  const { value, env } = args;

  return value.replace(ENV_TOKEN, (token: string, name: string) => {
    const resolved = env[name];
    if (resolved == null) {
      warn({
        message: `Couldn't find ${name} environment variable, leaving ${token} as is`,
      });
      return token;
    }
    return resolved;
  });
};

const parseDocument = (args: {
  content: string;
  format: ConfigFormat;
}): unknown => {
  const { content, format } = args;
  if (content.trim() === "") {
    return {};
  }
  return format === "toml" ? parseToml(content) : JSON.parse(content);
};

const readRawDocument = async (args: {
  configPath: string;
}): Promise<Record<string, unknown> | null> => {
  const { configPath } = args;

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }

  let document: unknown;
  try {
    document = parseDocument({ content, format: getConfigFormat(configPath) });
  } catch (err) {
    throw new UserInputError(
      `Failed to parse config file ${configPath}: ${errorMessage(err)}`,
    );
  }

  if (document == null || typeof document !== "object" || Array.isArray(document)) {
    throw new UserInputError(
      `Config file ${configPath} must contain a table of options`,
    );
  }

  return { ...document };
};

/**
 * Build a Config from an already-parsed document
 * @param args - Configuration arguments
 * @param args.document - Parsed JSON or TOML document
 * @param args.configPath - Path the document was read from
 * @param args.env - Environment used for $VAR expansion
 *
 * @returns The validated config
 */
export const configFromDocument = (args: {
  document: Record<string, unknown>;
  configPath: string;
  env: NodeJS.ProcessEnv;
}): Config => {
  const { document, configPath, env } = args;

  // Deep clone to avoid mutating the original during validation
  const configClone: unknown = JSON.parse(JSON.stringify(document));

  if (!validateConfigSchema(configClone)) {
    const details = (validateConfigSchema.errors ?? [])
      .map((e) => `${e.instancePath || "(root)"} ${e.message ?? "is invalid"}`)
      .join(", ");
    throw new UserInputError(`Invalid config file ${configPath}: ${details}`);
  }

  const expand = (value: string | undefined): string | null =>
    value == null ? null : expandEnvVars({ value, env });

  return {
    configPath,
    enableNightlyInfo: configClone.enable_nightly_info ?? true,
    enableReleaseBuild: configClone.enable_release_build ?? false,
    downloadsLocation: expand(configClone.downloads_location),
    installationLocation: expand(configClone.installation_location),
    versionSyncFileLocation: expand(configClone.version_sync_file_location),
    githubMirror: expand(configClone.github_mirror),
    rollbackLimit: configClone.rollback_limit ?? 3,
    addNeovimBinaryToPath: configClone.add_neovim_binary_to_path ?? null,
  };
};

/**
 * Load configuration from disk
 * A missing file yields the defaults
 * @param args - Configuration arguments
 * @param args.env - Environment (defaults to process.env)
 *
 * @returns The loaded config
 */
export const loadConfig = async (args?: {
  env?: NodeJS.ProcessEnv | null;
}): Promise<Config> => {
  const env = args?.env ?? process.env;
  const configPath = await getConfigPath({ env });
  const document = (await readRawDocument({ configPath })) ?? {};

  return configFromDocument({ document, configPath, env });
};

/**
 * Persist a single option, keeping every other key in the file untouched
 * @param args - Configuration arguments
 * @param args.configPath - Path to the config file
 * @param args.key - Option to write
 * @param args.value - New value
 */
export const saveConfigValue = async (args: {
  configPath: string;
  key: ConfigKey;
  value: string | number | boolean;
}): Promise<void> => {
  const { configPath, key, value } = args;
  const document = (await readRawDocument({ configPath })) ?? {};
  document[key] = value;

  const content =
    getConfigFormat(configPath) === "toml"
      ? `${stringifyToml(document)}\n`
      : `${JSON.stringify(document, null, 2)}\n`;

  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, content);
};
