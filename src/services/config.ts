/**
 * Settings loaded from environment variables
 */

import cron from 'node-cron';

export interface LlmSettings {
  anthropicApiKey: string;
  model: string;
  temperature: number;
  maxTokensPerSection: number;
  maxTokensAnalysis: number;
  timeoutSeconds: number;
  maxRetries: number;
}

export interface WorkflowSettings {
  parallelSectionGeneration: boolean;
  minConfidenceThreshold: number;
}

export interface NlpSettings {
  extractEntities: boolean;
  extractTopics: boolean;
}

export interface StoreSettings {
  retentionHours: number;
  cleanupSchedule: string;
}

export interface Settings {
  server: { name: string; port: number; corsOrigins: string[] };
  llm: LlmSettings;
  workflow: WorkflowSettings;
  nlp: NlpSettings;
  store: StoreSettings;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: string, min: number, max: number): number {
  const raw = env[key] || fallback;
  const value = Number(raw);

  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new Error(`Invalid ${key}: "${raw}" is not a number`);
  }
  if (value < min || value > max) {
    throw new Error(`Invalid ${key}: ${value} must be between ${min} and ${max}`);
  }

  return value;
}

function readInt(env: Env, key: string, fallback: string, min: number, max: number): number {
  const value = readNumber(env, key, fallback, min, max);
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid ${key}: ${value} must be a whole number`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new Error(`Invalid ${key}: "${raw}" is not a boolean`);
  }
}

export function loadSettings(env: Env = process.env): Settings {
  const cleanupSchedule = env.SNAPSHOT_CLEANUP_SCHEDULE || '0 * * * *';
  if (!cron.validate(cleanupSchedule)) {
    throw new Error(`Invalid SNAPSHOT_CLEANUP_SCHEDULE: "${cleanupSchedule}"`);
  }

  return {
    server: {
      name: env.SERVER_NAME || 'snapshot-engine',
      port: readInt(env, 'PORT', '3000', 0, 65535),
      corsOrigins: (env.CORS_ORIGINS || 'http://localhost:5173,http://localhost:3000')
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean),
    },
    llm: {
      anthropicApiKey: env.ANTHROPIC_API_KEY || '',
      model: env.LLM_MODEL || 'claude-sonnet-4-20250514',
      temperature: readNumber(env, 'LLM_TEMPERATURE', '0.3', 0, 1),
      maxTokensPerSection: readInt(env, 'LLM_MAX_TOKENS_PER_SECTION', '1500', 100, 4000),
      maxTokensAnalysis: readInt(env, 'LLM_MAX_TOKENS_ANALYSIS', '2000', 500, 4000),
      timeoutSeconds: readInt(env, 'LLM_TIMEOUT', '60', 10, 300),
      maxRetries: readInt(env, 'LLM_MAX_RETRIES', '3', 1, 5),
    },
    workflow: {
      parallelSectionGeneration: readBoolean(env, 'WORKFLOW_PARALLEL_SECTION_GENERATION', false),
      minConfidenceThreshold: readNumber(env, 'WORKFLOW_MIN_CONFIDENCE_THRESHOLD', '0.5', 0, 1),
    },
    nlp: {
      extractEntities: readBoolean(env, 'NLP_EXTRACT_ENTITIES', true),
      extractTopics: readBoolean(env, 'NLP_EXTRACT_TOPICS', true),
    },
    store: {
      retentionHours: readNumber(env, 'SNAPSHOT_RETENTION_HOURS', '24', 1, 24 * 365),
      cleanupSchedule,
    },
  };
}

let settings: Settings | null = null;

export function getSettings(): Settings {
  if (!settings) {
    settings = loadSettings();
  }

  return settings;
}
