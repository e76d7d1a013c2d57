import type { AnalyzeOptions } from '@dumplens/parser';

export type AnalysisSettings = Required<AnalyzeOptions>;

export interface AppConfig {
  port: number;
  uploadDir: string;
  maxFileSize: number; // bytes
  maxTextSize: string; // body-parser limit for pasted logs
  analysis: AnalysisSettings;
}

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

// Unset, non-numeric or non-positive values fall back to the default
function positiveIntEnv(key: string, fallback: number): number {
  const value = parseInt(env(key, String(fallback)), 10);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function loadConfig(): AppConfig {
  return {
    port: parseInt(env('PORT', '8000'), 10),
    uploadDir: env('UPLOAD_DIR', '/tmp/dumplens-uploads'),
    maxFileSize: parseInt(env('MAX_FILE_SIZE', String(50 * 1024 * 1024)), 10), // 50MB
    maxTextSize: env('MAX_TEXT_SIZE', '10mb'),

    analysis: {
      hexDumpBytes: positiveIntEnv('HEX_DUMP_BYTES', 256),
      minStringLength: positiveIntEnv('MIN_STRING_LENGTH', 4),
    },
  };
}

// Mutable runtime config (can be changed via settings API)
let currentConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!currentConfig) {
    currentConfig = loadConfig();
  }
  return currentConfig;
}

export function updateAnalysisOptions(updates: Partial<AnalysisSettings>): void {
  const config = getConfig();
  Object.assign(config.analysis, updates);
}
