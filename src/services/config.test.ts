import { describe, expect, it } from 'vitest';
import { loadSettings } from './config';

describe('loadSettings', () => {
  it('applies defaults when nothing is set', () => {
    const settings = loadSettings({});

    expect(settings.server).toEqual({
      name: 'snapshot-engine',
      port: 3000,
      corsOrigins: ['http://localhost:5173', 'http://localhost:3000'],
    });
    expect(settings.llm).toEqual({
      anthropicApiKey: '',
      model: 'claude-sonnet-4-20250514',
      temperature: 0.3,
      maxTokensPerSection: 1500,
      maxTokensAnalysis: 2000,
      timeoutSeconds: 60,
      maxRetries: 3,
    });
    expect(settings.workflow).toEqual({ parallelSectionGeneration: false, minConfidenceThreshold: 0.5 });
    expect(settings.nlp).toEqual({ extractEntities: true, extractTopics: true });
    expect(settings.store).toEqual({ retentionHours: 24, cleanupSchedule: '0 * * * *' });
  });

  it('reads overrides from the environment', () => {
    const settings = loadSettings({
      ANTHROPIC_API_KEY: 'test-secret',
      PORT: '8080',
      LLM_MODEL: 'claude-test',
      LLM_TEMPERATURE: '0',
      LLM_MAX_RETRIES: '5',
      WORKFLOW_PARALLEL_SECTION_GENERATION: 'yes',
      WORKFLOW_MIN_CONFIDENCE_THRESHOLD: '0.7',
      NLP_EXTRACT_TOPICS: '0',
      SNAPSHOT_RETENTION_HOURS: '48',
      SNAPSHOT_CLEANUP_SCHEDULE: '*/15 * * * *',
      CORS_ORIGINS: ' https://a.example.com , https://b.example.com ,',
    });

    expect(settings.server.port).toBe(8080);
    expect(settings.server.corsOrigins).toEqual(['https://a.example.com', 'https://b.example.com']);
    expect(settings.llm.anthropicApiKey).toBe('test-secret');
    expect(settings.llm.model).toBe('claude-test');
    expect(settings.llm.temperature).toBe(0);
    expect(settings.llm.maxRetries).toBe(5);
    expect(settings.workflow).toEqual({ parallelSectionGeneration: true, minConfidenceThreshold: 0.7 });
    expect(settings.nlp).toEqual({ extractEntities: true, extractTopics: false });
    expect(settings.store).toEqual({ retentionHours: 48, cleanupSchedule: '*/15 * * * *' });
  });

  it('treats empty values as unset', () => {
    expect(loadSettings({ PORT: '', NLP_EXTRACT_ENTITIES: '' }).server.port).toBe(3000);
    expect(loadSettings({ NLP_EXTRACT_ENTITIES: '' }).nlp.extractEntities).toBe(true);
  });

  it('rejects values that are not numbers', () => {
    expect(() => loadSettings({ PORT: 'abc' })).toThrow('Invalid PORT: "abc" is not a number');
  });

  it('rejects values out of range', () => {
    expect(() => loadSettings({ LLM_TEMPERATURE: '1.5' })).toThrow(
      'Invalid LLM_TEMPERATURE: 1.5 must be between 0 and 1'
    );
    expect(() => loadSettings({ LLM_MAX_TOKENS_PER_SECTION: '50' })).toThrow(
      'Invalid LLM_MAX_TOKENS_PER_SECTION: 50 must be between 100 and 4000'
    );
  });

  it('rejects fractional counts', () => {
    expect(() => loadSettings({ LLM_MAX_RETRIES: '2.5' })).toThrow(
      'Invalid LLM_MAX_RETRIES: 2.5 must be a whole number'
    );
  });

  it('rejects unknown booleans', () => {
    expect(() => loadSettings({ NLP_EXTRACT_ENTITIES: 'maybe' })).toThrow(
      'Invalid NLP_EXTRACT_ENTITIES: "maybe" is not a boolean'
    );
  });

  it('rejects an invalid cleanup schedule', () => {
    expect(() => loadSettings({ SNAPSHOT_CLEANUP_SCHEDULE: 'every hour' })).toThrow(
      'Invalid SNAPSHOT_CLEANUP_SCHEDULE: "every hour"'
    );
  });
});
