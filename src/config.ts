import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import logger from './logger.js';
import { ConfigError, ConfigFileError, errorMessage } from './errors.js';

export interface SummarizerConfig {
    apiKey: string;
    model: string;
    apiBase: string;
    maxRetries: number;
    /** Seconds between attempts. */
    retryDelay: number;
    maxTokens: number;
    temperature: number;
}

export const DEFAULT_CONFIG = {
    model: 'gpt-3.5-turbo',
    apiBase: 'https://api.openai.com/v1',
    maxRetries: 3,
    retryDelay: 5,
    maxTokens: 500,
    temperature: 0.3,
} satisfies Omit<SummarizerConfig, 'apiKey'>;

export const DEFAULT_CONFIG_PATH = 'config.yaml';

export const CONFIG_TEMPLATE = `# OpenAI-compatible API
api_key: "your-api-key-here"
model: "${DEFAULT_CONFIG.model}"
api_base: "${DEFAULT_CONFIG.apiBase}"

# Requests
max_retries: ${DEFAULT_CONFIG.maxRetries}
retry_delay: ${DEFAULT_CONFIG.retryDelay}  # seconds
max_tokens: ${DEFAULT_CONFIG.maxTokens}
temperature: ${DEFAULT_CONFIG.temperature}

# Copy this file to config.yaml and fill in your API key.
# Keys present here override OPENAI_API_KEY, MODEL_NAME, API_BASE, MAX_RETRIES,
# RETRY_DELAY, MAX_TOKENS and TEMPERATURE from the environment.
`;

// YAML leaves `key:` with no value as null; treat that as absent.
const configFileSchema = z.object({
    api_key: z.string().nullish(),
    model: z.string().min(1).nullish(),
    api_base: z.string().url().nullish(),
    max_retries: z.number().int().min(1).nullish(),
    retry_delay: z.number().min(0).nullish(),
    max_tokens: z.number().int().positive().nullish(),
    temperature: z.number().min(0).max(2).nullish(),
});

type ConfigFile = z.infer<typeof configFileSchema>;

const configFieldSchemas: Record<string, z.ZodTypeAny> = configFileSchema.shape;

export interface LoadConfigOptions {
    configPath?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Merges environment variables with the optional YAML config file (file wins).
 * Throws ConfigError when no API key is available from either source.
 */
export function loadConfig(options: LoadConfigOptions = {}): SummarizerConfig {
    const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
    const env = options.env ?? process.env;

    const merged = { ...configFromEnv(env), ...readConfigFile(configPath) };

    if (!merged.apiKey) {
        throw new ConfigError('API key is not set.', [
            `Create ${configPath} and set api_key`,
            'or set OPENAI_API_KEY in the environment or a .env file',
        ]);
    }

    return {
        ...DEFAULT_CONFIG,
        ...merged,
        apiKey: merged.apiKey,
    };
}

export function configFromEnv(env: NodeJS.ProcessEnv): Partial<SummarizerConfig> {
    return {
        apiKey: env.OPENAI_API_KEY || undefined,
        model: env.MODEL_NAME || DEFAULT_CONFIG.model,
        apiBase: env.API_BASE || DEFAULT_CONFIG.apiBase,
        maxRetries: envNumber(env, 'MAX_RETRIES', DEFAULT_CONFIG.maxRetries, true),
        retryDelay: envNumber(env, 'RETRY_DELAY', DEFAULT_CONFIG.retryDelay, false),
        maxTokens: envNumber(env, 'MAX_TOKENS', DEFAULT_CONFIG.maxTokens, true),
        temperature: envNumber(env, 'TEMPERATURE', DEFAULT_CONFIG.temperature, false),
    };
}

function envNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, integer: boolean): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;

    const value = Number(raw);
    if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
        logger.warn({ name, value: raw, fallback }, 'Ignoring invalid numeric environment variable');
        return fallback;
    }
    return value;
}

/**
 * Reads the YAML config file. A missing or malformed file is not fatal: the
 * problem is logged, an example file is generated and no overrides are returned.
 * A single invalid setting is logged and dropped; the other settings still apply.
 */
export function readConfigFile(configPath: string): Partial<SummarizerConfig> {
    if (!fs.existsSync(configPath)) {
        logger.warn({ configPath }, 'Config file not found, using environment variables and defaults');
        writeExampleConfig(`${configPath}.example`);
        return {};
    }

    try {
        const raw: unknown = yaml.load(fs.readFileSync(configPath, 'utf8'));
        if (raw === undefined || raw === null) return {};

        const mapping = z.record(z.unknown()).safeParse(raw);
        if (!mapping.success) {
            throw new ConfigFileError(configPath, 'expected a mapping of settings');
        }
        return fromConfigFile(configFileSchema.parse(validSettings(configPath, mapping.data)));
    } catch (error) {
        const fileError = error instanceof ConfigFileError
            ? error
            : new ConfigFileError(configPath, errorMessage(error), error);
        logger.error({ err: fileError }, fileError.message);
        logger.info({ configPath }, 'Fix the config file format or configure through environment variables');
        writeExampleConfig(`${configPath}.example`);
        return {};
    }
}

// Unknown keys are skipped.
function validSettings(configPath: string, settings: Record<string, unknown>): Record<string, unknown> {
    const valid: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(settings)) {
        if (!Object.hasOwn(configFieldSchemas, key)) continue;

        const result = configFieldSchemas[key].safeParse(value);
        if (result.success) {
            valid[key] = result.data;
        } else {
            const reason = result.error.issues.map(issue => issue.message).join('; ');
            logger.warn({ configPath, key, reason }, 'Ignoring invalid config file setting');
        }
    }
    return valid;
}

function fromConfigFile(file: ConfigFile): Partial<SummarizerConfig> {
    const config: Partial<SummarizerConfig> = {};
    if (file.api_key) config.apiKey = file.api_key;
    if (file.model) config.model = file.model;
    if (file.api_base) config.apiBase = file.api_base;
    if (file.max_retries != null) config.maxRetries = file.max_retries;
    if (file.retry_delay != null) config.retryDelay = file.retry_delay;
    if (file.max_tokens != null) config.maxTokens = file.max_tokens;
    if (file.temperature != null) config.temperature = file.temperature;
    return config;
}

/**
 * Writes the documented template unless the file already exists.
 * @returns true when a new file was written
 */
export function writeExampleConfig(examplePath: string): boolean {
    if (fs.existsSync(examplePath)) return false;

    try {
        fs.writeFileSync(examplePath, CONFIG_TEMPLATE, 'utf8');
        logger.info({ examplePath }, 'Created example config file');
        return true;
    } catch (error) {
        logger.error({ err: error, examplePath }, 'Failed to create example config file');
        return false;
    }
}
