import fs from 'node:fs';
import path from 'node:path';

import type { BatchSummary, ClearSummary, ItemOutcome } from '../pipeline/types.js';

export interface RunStatus {
  mode: 'run' | 'clear';
  startedAt: string;
  finishedAt: string;
  summary: BatchSummary | ClearSummary;
  logPath: string | null;
}

/**
 * Per-run JSON log of item outcomes plus a last-run status file.
 * Layout: <dir>/logs/<timestamp>.json and <dir>/status/last-run.json
 */
export class RunLogger {
  private readonly logDir: string;
  private readonly statusDir: string;
  private logPath?: string;
  private lastFlushedCount = 0;
  private lastFlushedAt = 0;
  private readonly flushEvery: number;
  private readonly flushIntervalMs: number;
  private readonly entries: ItemOutcome[] = [];

  constructor(dir: string, opts?: { flushEvery?: number; flushIntervalMs?: number }) {
    this.logDir = path.join(dir, 'logs');
    this.statusDir = path.join(dir, 'status');
    const envFlushEvery = Number(process.env.WARNARR_LOG_FLUSH_EVERY);
    const envFlushInterval = Number(process.env.WARNARR_LOG_FLUSH_INTERVAL_MS);
    this.flushEvery = opts?.flushEvery ?? (Number.isFinite(envFlushEvery) && envFlushEvery > 0 ? envFlushEvery : 10);
    this.flushIntervalMs =
      opts?.flushIntervalMs ?? (Number.isFinite(envFlushInterval) && envFlushInterval > 0 ? envFlushInterval : 15000);
  }

  private ensureDirs() {
    fs.mkdirSync(this.logDir, { recursive: true });
    fs.mkdirSync(this.statusDir, { recursive: true });
  }

  initLog(): string {
    if (this.logPath) return this.logPath;
    this.ensureDirs();
    const ts = new Date().toISOString().replace(/[:.]/g, '-');
    this.logPath = path.join(this.logDir, `${ts}.json`);
    this.writeLogAtomic();
    return this.logPath;
  }

  private writeLogAtomic(): string {
    this.ensureDirs();
    const filePath = this.logPath ?? this.initLog();
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(this.entries, null, 2));
    fs.renameSync(tmpPath, filePath);
    this.lastFlushedCount = this.entries.length;
    this.lastFlushedAt = Date.now();
    return filePath;
  }

  /** Record one outcome; flushes every N entries or T ms */
  record(outcome: ItemOutcome): void {
    this.entries.push(outcome);
    this.initLog();
    const entriesSince = this.entries.length - this.lastFlushedCount;
    const timeSince = Date.now() - this.lastFlushedAt;
    if (entriesSince >= this.flushEvery || timeSince >= this.flushIntervalMs) {
      this.writeLogAtomic();
    }
  }

  /** Final flush; returns the log path */
  flush(): string {
    this.initLog();
    return this.writeLogAtomic();
  }

  writeStatus(status: RunStatus): string {
    this.ensureDirs();
    const filePath = path.join(this.statusDir, 'last-run.json');
    fs.writeFileSync(filePath, JSON.stringify(status, null, 2));
    return filePath;
  }
}
