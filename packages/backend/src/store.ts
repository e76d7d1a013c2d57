import type { CrashReport } from '@dumplens/parser';
import type { AnalysisSettings } from './config.js';

const DEFAULT_TTL_MS = 60 * 60 * 1000; // 1 hour

interface StoredReport {
  report: CrashReport;
  settings: AnalysisSettings;
  timestamp: number;
}

function sameSettings(a: AnalysisSettings, b: AnalysisSettings): boolean {
  return a.hexDumpBytes === b.hexDumpBytes && a.minStringLength === b.minStringLength;
}

/**
 * In-memory cache of crash reports keyed by upload ID. A report only
 * counts as a hit while the analysis settings it was built with are
 * still the current ones.
 */
export class ReportStore {
  private store = new Map<string, StoredReport>();

  constructor(private readonly ttlMs = DEFAULT_TTL_MS) {}

  set(id: string, report: CrashReport, settings: AnalysisSettings): void {
    this.store.set(id, { report, settings: { ...settings }, timestamp: Date.now() });
    this.cleanup();
  }

  get(id: string, settings: AnalysisSettings): CrashReport | undefined {
    const entry = this.store.get(id);
    if (!entry) return undefined;
    if (Date.now() - entry.timestamp > this.ttlMs || !sameSettings(entry.settings, settings)) {
      this.store.delete(id);
      return undefined;
    }
    return entry.report;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.store) {
      if (now - entry.timestamp > this.ttlMs) {
        this.store.delete(key);
      }
    }
  }
}

export const reportStore = new ReportStore();
