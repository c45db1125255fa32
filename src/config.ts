import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

// Warn about unset or malformed environment variables
function validateEnvironmentVariables(): void {
    const optionalVars = [
        'APP_HOST',
        'APP_PORT',
        'APP_LOG_LEVEL',
        'LLM_API_KEY',
        'LIGHTRAG_URL',
        'WEB_SEARCH_API_KEY'
    ];

    const missingOptional = optionalVars.filter(varName => !process.env[varName]);

    if (missingOptional.length > 0 && process.env.NODE_ENV !== 'test') {
        console.warn(`Optional environment variables not set (using defaults): ${missingOptional.join(', ')}`);
    }

    if (process.env.LIGHTRAG_URL && !/^https?:\/\//.test(process.env.LIGHTRAG_URL)) {
        console.warn('LIGHTRAG_URL should start with http:// or https://');
    }

    if (process.env.APP_PORT && (isNaN(Number(process.env.APP_PORT)) || Number(process.env.APP_PORT) < 1 || Number(process.env.APP_PORT) > 65535)) {
        console.warn('APP_PORT should be a valid port number (1-65535)');
    }

    if (process.env.ACCEPTANCE_THRESHOLD) {
        const threshold = Number(process.env.ACCEPTANCE_THRESHOLD);
        if (isNaN(threshold) || threshold < 0 || threshold > 1) {
            console.warn('ACCEPTANCE_THRESHOLD should be a number between 0 and 1');
        }
    }
}

validateEnvironmentVariables();

const AppSettingsSchema = z.object({
  name: z.string().default('Agentic RAG Workflow'),
  version: z.string().default('0.1.0'),
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(1).max(65535).default(8000),
  log_level: z.string().default('INFO'),
  cors_allowed_origins_str: z.string().default('*'),
  auth_token: z.string().optional(),
  rate_limit_max_requests: z.number().int().min(1).default(60),
  rate_limit_per_seconds: z.number().int().min(1).default(60),
});

export type AppSettings = z.infer<typeof AppSettingsSchema>;

const WorkflowSettingsSchema = z.object({
  max_retries: z.number().int().min(0).max(10).default(2),
  acceptance_threshold: z.number().min(0).max(1).default(0.7),
  temperature: z.number().min(0).max(2).default(0.3),
  max_tokens: z.number().int().min(1).max(32000).default(500),
});

export type WorkflowSettings = z.infer<typeof WorkflowSettingsSchema>;

const LLMSettingsSchema = z.object({
  api_key: z.string().optional(),
  base_url: z.string().default('https://api.openai.com/v1'),
  model: z.string().default('gpt-4o-mini'),
  timeout_ms: z.number().int().positive().default(60000),
});

export type LLMSettings = z.infer<typeof LLMSettingsSchema>;

const KnowledgeBaseSettingsSchema = z.object({
  base_url: z.string().default('http://localhost:9621'),
  query_path: z.string().default('/query'),
  timeout_ms: z.number().int().positive().default(30000),
});

export type KnowledgeBaseSettings = z.infer<typeof KnowledgeBaseSettingsSchema>;

const WebSearchSettingsSchema = z.object({
  api_key: z.string().optional(),
  base_url: z.string().default('https://api.tavily.com'),
  timeout_ms: z.number().int().positive().default(15000),
});

export type WebSearchSettings = z.infer<typeof WebSearchSettingsSchema>;

const SettingsFileSchema = z.object({
    app: AppSettingsSchema.partial().optional(),
    workflow: WorkflowSettingsSchema.partial().optional(),
    llm: LLMSettingsSchema.partial().optional(),
    knowledge_base: KnowledgeBaseSettingsSchema.partial().optional(),
    web_search: WebSearchSettingsSchema.partial().optional(),
});

type SettingsFile = z.infer<typeof SettingsFileSchema>;

const RuntimeSettingsSchema = z.object({
    app: AppSettingsSchema.default({}),
    workflow: WorkflowSettingsSchema.default({}),
    llm: LLMSettingsSchema.default({}),
    knowledge_base: KnowledgeBaseSettingsSchema.default({}),
    web_search: WebSearchSettingsSchema.default({}),
});

export type RuntimeSettings = z.infer<typeof RuntimeSettingsSchema>;

const numberFromEnv = (value: string | undefined): number | undefined => {
    if (value === undefined || value.trim() === '') {
        return undefined;
    }
    const parsed = Number(value);
    return isNaN(parsed) ? undefined : parsed;
};

// Drops undefined entries so env overrides never clobber file values
const definedOnly = <T extends Record<string, unknown>>(values: T): Partial<T> => {
    const result: Partial<T> = {};
    for (const key in values) {
        if (values[key] !== undefined) {
            result[key] = values[key];
        }
    }
    return result;
};

function readSettingsFile(yamlPath: string): SettingsFile {
    if (!fs.existsSync(yamlPath)) {
        console.warn(`Configuration file ${yamlPath} not found. Using environment variables and defaults.`);
        return {};
    }

    try {
        const fileContents = fs.readFileSync(yamlPath, 'utf8');
        if (!fileContents.trim()) {
            console.warn(`Configuration file ${yamlPath} is empty. Using defaults.`);
            return {};
        }

        const loadedData = yaml.load(fileContents);
        if (!loadedData || typeof loadedData !== 'object') {
            throw new Error(`Invalid YAML structure in ${yamlPath}`);
        }

        return SettingsFileSchema.parse(loadedData);
    } catch (error) {
        console.error(`Failed to load configuration from ${yamlPath}: ${error}`);
        if (process.env.NODE_ENV === 'production') {
            throw new Error(`Critical: Configuration loading failed in production. ${error}`);
        }
        console.warn(`Development mode: Continuing with default configuration.`);
        return {};
    }
}

export function loadRuntimeSettings(
    env: NodeJS.ProcessEnv = process.env,
    yamlPath: string = path.resolve(__dirname, '..', 'config', 'settings.yaml')
): RuntimeSettings {
    const data = readSettingsFile(yamlPath);

    const merged = {
        app: {
            ...data.app,
            ...definedOnly({
                host: env.APP_HOST,
                port: numberFromEnv(env.APP_PORT),
                log_level: env.APP_LOG_LEVEL,
                auth_token: env.APP_AUTH_TOKEN,
            }),
        },
        workflow: {
            ...data.workflow,
            ...definedOnly({
                max_retries: numberFromEnv(env.MAX_RETRIES),
                acceptance_threshold: numberFromEnv(env.ACCEPTANCE_THRESHOLD),
                temperature: numberFromEnv(env.TEMPERATURE),
                max_tokens: numberFromEnv(env.MAX_TOKENS),
            }),
        },
        llm: {
            ...data.llm,
            ...definedOnly({
                api_key: env.LLM_API_KEY || env.OPENAI_API_KEY,
                base_url: env.LLM_BASE_URL,
                model: env.LLM_MODEL,
            }),
        },
        knowledge_base: {
            ...data.knowledge_base,
            ...definedOnly({
                base_url: env.LIGHTRAG_URL,
                timeout_ms: numberFromEnv(env.LIGHTRAG_TIMEOUT_MS),
            }),
        },
        web_search: {
            ...data.web_search,
            ...definedOnly({
                api_key: env.WEB_SEARCH_API_KEY || env.TAVILY_API_KEY,
                base_url: env.WEB_SEARCH_BASE_URL,
            }),
        },
    };

    try {
        return RuntimeSettingsSchema.parse(merged);
    } catch (error) {
        console.error(`Failed to validate runtime settings: ${error}`);
        throw new Error(`Critical: Runtime settings validation failed. ${error}`);
    }
}

export const settings = loadRuntimeSettings();
