import fs from "fs";
import path from "path";

export interface PostThumbsConfig {
  /** Content API base URL */
  url: string;
  /** Content API key */
  apiKey: string;
  /** Content type processed when --post_type is not given */
  postType: string;
  /** Records per `thumbnail set` run when neither --amount nor --all is given */
  batchSize: number;
  /** Attached images fetched per record; only values above 1 can flag multiple images */
  attachmentLimit: number;
  /** Use the in-memory store instead of the content API */
  useMock: boolean;
  /** JSON file seeding the in-memory store */
  mockDataPath?: string;
}

export interface PostThumbsConfigOptions extends Partial<PostThumbsConfig> {
  /** Custom config file path */
  configPath?: string;
  /** Working directory for resolving paths */
  cwd?: string;
}

let globalConfig: Partial<PostThumbsConfig> | null = null;

export const DEFAULT_POST_TYPE = "post";
export const DEFAULT_BATCH_SIZE = 500;
export const DEFAULT_ATTACHMENT_LIMIT = 1;

const DEFAULT_CONFIG = {
  postType: DEFAULT_POST_TYPE,
  batchSize: DEFAULT_BATCH_SIZE,
  attachmentLimit: DEFAULT_ATTACHMENT_LIMIT,
  useMock: false,
};

/**
 * Load configuration from multiple sources in priority order:
 * 1. Options passed to this function
 * 2. Programmatically set config (via configure())
 * 3. Config file (post-thumbs.config.json / .postthumbsrc.json / .postthumbsrc)
 * 4. Environment variables
 * 5. Default values
 */
export function loadConfig(options: PostThumbsConfigOptions = {}): PostThumbsConfig {
  const cwd = options.cwd || process.cwd();
  const { configPath, cwd: _cwd, ...overrides } = options;

  // Highest precedence first
  const sources: Partial<PostThumbsConfig>[] = [
    overrides,
    globalConfig ?? {},
    loadConfigFile(configPath, cwd),
    loadConfigFromEnv(),
  ];

  function pick<K extends keyof PostThumbsConfig>(key: K): PostThumbsConfig[K] | undefined {
    for (const source of sources) {
      const value = source[key];
      if (value !== undefined) return value;
    }
    return undefined;
  }

  const mockDataPath = pick("mockDataPath");
  const config: PostThumbsConfig = {
    url: pick("url") || "",
    apiKey: pick("apiKey") || "",
    postType: pick("postType") || DEFAULT_CONFIG.postType,
    batchSize: pick("batchSize") ?? DEFAULT_CONFIG.batchSize,
    attachmentLimit: pick("attachmentLimit") ?? DEFAULT_CONFIG.attachmentLimit,
    useMock: pick("useMock") ?? DEFAULT_CONFIG.useMock,
    mockDataPath: mockDataPath ? path.resolve(cwd, mockDataPath) : undefined,
  };

  validateConfig(config);
  return config;
}

/**
 * Set configuration programmatically
 */
export function configure(config: Partial<PostThumbsConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}

export function getConfig(options?: PostThumbsConfigOptions): PostThumbsConfig {
  return loadConfig(options);
}

/**
 * Pick the known settings out of a parsed config file, rejecting wrong types.
 */
function parseConfigObject(data: unknown, source: string): Partial<PostThumbsConfig> {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`Config file must contain a JSON object: ${source}`);
  }

  const raw: Record<string, unknown> = { ...data };
  const config: Partial<PostThumbsConfig> = {};
  const wrongType = (key: string, expected: string) =>
    new Error(`Invalid "${key}" in ${source}: expected ${expected}`);

  for (const key of ["url", "apiKey", "postType", "mockDataPath"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string") throw wrongType(key, "a string");
    config[key] = value;
  }

  for (const key of ["batchSize", "attachmentLimit"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "number") throw wrongType(key, "a number");
    config[key] = value;
  }

  if (raw.useMock !== undefined) {
    if (typeof raw.useMock !== "boolean") throw wrongType("useMock", "a boolean");
    config.useMock = raw.useMock;
  }

  return config;
}

function loadConfigFile(configPath: string | undefined, cwd: string): Partial<PostThumbsConfig> {
  const possiblePaths = [
    configPath,
    path.join(cwd, "post-thumbs.config.json"),
    path.join(cwd, ".postthumbsrc.json"),
    path.join(cwd, ".postthumbsrc"),
  ].filter((candidate): candidate is string => Boolean(candidate));

  for (const configFilePath of possiblePaths) {
    if (!fs.existsSync(configFilePath)) continue;

    const content = fs.readFileSync(configFilePath, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse config file ${configFilePath}: ${reason}`);
    }
    return parseConfigObject(parsed, configFilePath);
  }

  return {};
}

function parseIntegerEnv(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid ${name}: expected an integer, got "${value}"`);
  }
  return parsed;
}

function loadConfigFromEnv(): Partial<PostThumbsConfig> {
  const config: Partial<PostThumbsConfig> = {
    url: process.env.POST_THUMBS_URL,
    apiKey: process.env.POST_THUMBS_API_KEY,
    postType: process.env.POST_THUMBS_POST_TYPE,
    batchSize: parseIntegerEnv("POST_THUMBS_BATCH_SIZE"),
    attachmentLimit: parseIntegerEnv("POST_THUMBS_ATTACHMENT_LIMIT"),
    mockDataPath: process.env.POST_THUMBS_MOCK_DATA,
  };

  if (process.env.POST_THUMBS_USE_MOCK) {
    config.useMock = process.env.POST_THUMBS_USE_MOCK === "true";
  }

  return config;
}

function validateConfig(config: PostThumbsConfig): void {
  const errors: string[] = [];

  if (!config.useMock) {
    if (!config.url) {
      errors.push("Missing required configuration: url");
    }
    if (!config.apiKey) {
      errors.push("Missing required configuration: apiKey");
    }
  }

  if (config.url && !isValidUrl(config.url)) {
    errors.push("Invalid URL format: url");
  }

  if (!Number.isInteger(config.batchSize) || config.batchSize < 1) {
    errors.push("batchSize must be a positive integer");
  }

  if (!Number.isInteger(config.attachmentLimit) || config.attachmentLimit < 1) {
    errors.push("attachmentLimit must be a positive integer");
  }

  if (errors.length > 0) {
    throw new Error(`post-thumbs configuration errors:\n${errors.join("\n")}`);
  }
}

function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}
