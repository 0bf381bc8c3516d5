// src/config/mentor-config.ts

/**
 * @file Configuration for the upstream clients: defaults, file and environment loading,
 * and schema validation.
 *
 * Precedence, lowest first: built-in defaults, the optional YAML/JSON file, environment
 * variables. The merged result is validated before it is returned.
 */

import { readFileSync } from 'fs';
import yaml from 'js-yaml';
import Ajv, { JSONSchemaType } from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError } from '../core/errors';
import { JsonObject, asJsonObject, errorMessage, isJsonObject } from '../core/utils';
import { DEFAULT_COMPLETION_BASE_URL, DEFAULT_COMPLETION_MODEL } from '../llm/adapters/openai/openai-completion-client';

export interface RagConfig {
  /** Full URL of the retrieval query endpoint. */
  apiUrl: string;
  timeoutSeconds: number;
  topK: number;
}

export interface CompletionConfig {
  /** Falls back to the GROQ_API_KEY environment variable inside the client. */
  apiKey?: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutSeconds: number;
}

export interface ContentConfig {
  baseUrl: string;
  username: string;
  password: string;
  timeoutSeconds: number;
  longTimeoutSeconds: number;
}

export interface MentorConfig {
  rag: RagConfig;
  completion: CompletionConfig;
  /** Content enrichment is disabled when absent. */
  content?: ContentConfig;
}

export interface LoadMentorConfigOptions {
  /** Path to a YAML or JSON configuration file. */
  configPath?: string;
  /** Environment to read overrides from. @default process.env */
  env?: NodeJS.ProcessEnv;
}

export const DEFAULT_RAG_CONFIG: Omit<RagConfig, 'apiUrl'> = {
  timeoutSeconds: 30,
  topK: 5,
};

export const DEFAULT_COMPLETION_CONFIG: CompletionConfig = {
  baseUrl: DEFAULT_COMPLETION_BASE_URL,
  model: DEFAULT_COMPLETION_MODEL,
  maxTokens: 1200,
  temperature: 0.7,
  timeoutSeconds: 60,
};

export const DEFAULT_CONTENT_CONFIG: Omit<ContentConfig, 'baseUrl' | 'username' | 'password'> = {
  timeoutSeconds: 30,
  longTimeoutSeconds: 60,
};

const positiveSeconds = { type: 'number', exclusiveMinimum: 0 } as const;

const mentorConfigSchema: JSONSchemaType<MentorConfig> = {
  type: 'object',
  properties: {
    rag: {
      type: 'object',
      properties: {
        apiUrl: { type: 'string', format: 'uri' },
        timeoutSeconds: positiveSeconds,
        topK: { type: 'integer', minimum: 1 },
      },
      required: ['apiUrl', 'timeoutSeconds', 'topK'],
      additionalProperties: false,
    },
    completion: {
      type: 'object',
      properties: {
        apiKey: { type: 'string', nullable: true },
        baseUrl: { type: 'string', format: 'uri' },
        model: { type: 'string', minLength: 1 },
        maxTokens: { type: 'integer', minimum: 1 },
        temperature: { type: 'number', minimum: 0, maximum: 2 },
        timeoutSeconds: positiveSeconds,
      },
      required: ['baseUrl', 'model', 'maxTokens', 'temperature', 'timeoutSeconds'],
      additionalProperties: false,
    },
    content: {
      type: 'object',
      nullable: true,
      properties: {
        baseUrl: { type: 'string', format: 'uri' },
        username: { type: 'string', minLength: 1 },
        password: { type: 'string', minLength: 1 },
        timeoutSeconds: positiveSeconds,
        longTimeoutSeconds: positiveSeconds,
      },
      required: ['baseUrl', 'username', 'password', 'timeoutSeconds', 'longTimeoutSeconds'],
      additionalProperties: false,
    },
  },
  required: ['rag', 'completion'],
  additionalProperties: false,
};

// Environment values are strings; coercion turns "30" into 30 before range checks.
const ajv = new Ajv({ allErrors: true, coerceTypes: true });
addFormats(ajv);
const validateMentorConfig = ajv.compile(mentorConfigSchema);

/** Drops keys whose value is undefined, so they do not overwrite lower layers. */
function definedOnly(values: Record<string, string | undefined>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Reads a YAML or JSON configuration file (JSON parses as YAML).
 * @throws ConfigurationError when the file cannot be read or is not a mapping.
 */
export function readConfigFile(configPath: string): JsonObject {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigurationError(`Could not read configuration file ${configPath}: ${errorMessage(error)}`, {
      configPath,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (error: unknown) {
    throw new ConfigurationError(`Configuration file ${configPath} is not valid YAML or JSON: ${errorMessage(error)}`, {
      configPath,
    });
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigurationError(`Configuration file ${configPath} must contain a mapping at the top level.`, {
      configPath,
    });
  }
  return parsed;
}

/**
 * Validates an already-merged configuration object.
 * @throws ConfigurationError listing every schema violation.
 */
export function validateConfig(candidate: unknown): MentorConfig {
  if (!validateMentorConfig(candidate)) {
    const details = ajv.errorsText(validateMentorConfig.errors, { dataVar: 'config' });
    throw new ConfigurationError(`Invalid configuration: ${details}`, { errors: validateMentorConfig.errors });
  }
  return candidate;
}

/**
 * Loads the configuration from defaults, an optional file and the environment.
 *
 * Environment variables: RAG_API_URL, RAG_TIMEOUT_SECONDS, RAG_TOP_K, GROQ_API_KEY,
 * GROQ_BASE_URL, GROQ_MODEL, VAANI_BASE_URL, VAANI_USERNAME, VAANI_PASSWORD.
 * The content section is built only when the file or a VAANI_* variable provides it.
 */
export function loadMentorConfig(options: LoadMentorConfigOptions = {}): MentorConfig {
  const env = options.env || process.env;
  const file = options.configPath ? readConfigFile(options.configPath) : {};

  const contentFromEnv = definedOnly({
    baseUrl: env.VAANI_BASE_URL,
    username: env.VAANI_USERNAME,
    password: env.VAANI_PASSWORD,
  });

  const merged: JsonObject = {
    rag: {
      ...DEFAULT_RAG_CONFIG,
      ...asJsonObject(file.rag),
      ...definedOnly({ apiUrl: env.RAG_API_URL, timeoutSeconds: env.RAG_TIMEOUT_SECONDS, topK: env.RAG_TOP_K }),
    },
    completion: {
      ...DEFAULT_COMPLETION_CONFIG,
      ...asJsonObject(file.completion),
      ...definedOnly({ apiKey: env.GROQ_API_KEY, baseUrl: env.GROQ_BASE_URL, model: env.GROQ_MODEL }),
    },
  };

  if (isJsonObject(file.content) || Object.keys(contentFromEnv).length > 0) {
    merged.content = { ...DEFAULT_CONTENT_CONFIG, ...asJsonObject(file.content), ...contentFromEnv };
  }

  for (const key of Object.keys(file)) {
    if (!(key in merged) && key !== 'content') {
      merged[key] = file[key];
    }
  }

  return validateConfig(merged);
}
