import { log } from '../utils/logger';
import { describeError } from './errors';
import { SessionReport } from './types';

export type JobLogLevel = 'INFO' | 'SUCCESS' | 'WARN' | 'ERROR';

export interface JobLogEntry {
  timestamp: string;
  level: JobLogLevel;
  message: string;
}

export type JobOutcome = 'completed' | 'cancelled' | 'failed';

export interface JobCounts {
  searchesPerformed: number;
  leadsFound: number;
  leadsSaved: number;
  messagesDrafted: number;
}

export interface JobStatus {
  state: 'idle' | 'running';
  isRunning: boolean;
  progress: number;
  statusMessage: string;
  lastOutcome: JobOutcome | null;
  counts: JobCounts;
  sessionId: string | null;
  industry: string | null;
  startedAt: string | null;
}

/** Write access to the job state, held by the one worker that owns the current run. */
export interface JobRun {
  readonly sessionId: string;
  progress(percent: number, message?: string): void;
  log(level: JobLogLevel, message: string): void;
  updateCounts(counts: Partial<JobCounts>): void;
  stopRequested(): boolean;
  complete(report: SessionReport, message: string): void;
  cancel(report: SessionReport, message: string): void;
  fail(error: unknown): void;
}

export const DEFAULT_LOG_CAPACITY = 100;

const emptyCounts = (): JobCounts => ({ searchesPerformed: 0, leadsFound: 0, leadsSaved: 0, messagesDrafted: 0 });

const clampPercent = (value: number): number => Math.min(100, Math.max(0, Math.round(value)));

/**
 * Process-wide job state. Every method runs to completion without yielding,
 * so the idle -> running check-and-set in tryBegin cannot interleave with
 * another start, and readers always see a whole snapshot.
 */
export class JobController {
  private running = false;
  private stopFlag = false;
  private progressPercent = 0;
  private statusMessage = 'System ready';
  private lastOutcome: JobOutcome | null = null;
  private counts: JobCounts = emptyCounts();
  private sessionId: string | null = null;
  private industry: string | null = null;
  private startedAt: string | null = null;
  private logs: JobLogEntry[] = [];
  private lastResults: SessionReport | null = null;
  private runToken = 0;

  constructor(private readonly logCapacity = DEFAULT_LOG_CAPACITY) {}

  tryBegin(sessionId: string, industry: string, message = 'Starting search'): JobRun | null {
    if (this.running) return null;

    this.runToken += 1;
    const token = this.runToken;
    this.running = true;
    this.stopFlag = false;
    this.progressPercent = 0;
    this.statusMessage = message;
    this.counts = emptyCounts();
    this.sessionId = sessionId;
    this.industry = industry;
    this.startedAt = new Date().toISOString();
    this.logs = [];
    this.append('INFO', message);

    const owns = (): boolean => this.running && this.runToken === token;
    const finish = (outcome: JobOutcome): void => {
      this.running = false;
      this.stopFlag = false;
      this.lastOutcome = outcome;
    };

    return {
      sessionId,
      progress: (percent, statusMessage) => {
        if (!owns()) return;
        this.progressPercent = Math.max(this.progressPercent, clampPercent(percent));
        if (statusMessage) this.statusMessage = statusMessage;
      },
      log: (level, entry) => {
        if (owns()) this.append(level, entry);
      },
      updateCounts: (counts) => {
        if (owns()) this.counts = { ...this.counts, ...counts };
      },
      stopRequested: () => owns() && this.stopFlag,
      complete: (report, statusMessage) => {
        if (!owns()) return;
        this.progressPercent = 100;
        this.statusMessage = statusMessage;
        this.lastResults = structuredClone(report);
        this.append('SUCCESS', statusMessage);
        finish('completed');
      },
      cancel: (report, statusMessage) => {
        if (!owns()) return;
        this.statusMessage = statusMessage;
        this.lastResults = structuredClone(report);
        this.append('WARN', statusMessage);
        finish('cancelled');
      },
      fail: (error) => {
        if (!owns()) return;
        this.progressPercent = 0;
        this.statusMessage = `Error: ${describeError(error)}`;
        this.append('ERROR', this.statusMessage);
        finish('failed');
      },
    };
  }

  requestStop(): boolean {
    if (!this.running) return false;
    if (!this.stopFlag) {
      this.stopFlag = true;
      this.statusMessage = 'Stopping search...';
      this.append('WARN', 'Stop requested, finishing at the next checkpoint');
    }
    return true;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): JobStatus {
    return {
      state: this.running ? 'running' : 'idle',
      isRunning: this.running,
      progress: this.progressPercent,
      statusMessage: this.statusMessage,
      lastOutcome: this.lastOutcome,
      counts: { ...this.counts },
      sessionId: this.sessionId,
      industry: this.industry,
      startedAt: this.startedAt,
    };
  }

  getLogs(): JobLogEntry[] {
    return this.logs.map((entry) => ({ ...entry }));
  }

  getLastResults(): SessionReport | null {
    return this.lastResults ? structuredClone(this.lastResults) : null;
  }

  private append(level: JobLogLevel, message: string): void {
    this.logs.push({ timestamp: new Date().toISOString(), level, message });
    if (this.logs.length > this.logCapacity) {
      this.logs.splice(0, this.logs.length - this.logCapacity);
    }
    log(level === 'SUCCESS' ? 'INFO' : level, message);
  }
}
