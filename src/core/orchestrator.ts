import { randomUUID } from 'crypto';
import { TextAugmenter } from '../augment/textAugmenter';
import { SourceCollector, SourceUsage } from '../collectors/common';
import { IndustryInfo, IndustryKey, IndustryPolicy } from '../industries/base';
import { listIndustries, resolveIndustry } from '../industries/registry';
import { LeadStore } from '../store/leadStore';
import { CollectorBinder } from './collectorFactory';
import { LeadBatch, resolveDuplicate } from './deduplicator';
import {
  ConfigurationMissingError,
  describeError,
  JobAlreadyRunningError,
  OrchestratorFaultError,
  PersistenceFailureError,
  RequestValidationError,
  SourceUnavailableError,
} from './errors';
import { hasDisplayName } from './identity';
import { JobController, JobLogEntry, JobRun, JobStatus } from './jobController';
import { DEFAULT_LIMITS, normalizeSearchRequest, RequestLimits } from './searchRequest';
import { SessionArchive } from './sessionArchive';
import {
  DraftedMessage,
  LeadCandidate,
  PhaseStatus,
  PhaseSummary,
  SearchRequest,
  SessionReport,
  SessionStats,
  SourceName,
} from './types';

export interface OrchestratorDeps {
  job: JobController;
  store: LeadStore;
  bindCollectors: CollectorBinder;
  defaultCities: string[];
  augmenter?: TextAugmenter | null;
  archive?: SessionArchive | null;
  industry?: string;
  draftSampleSize?: number;
  limits?: RequestLimits;
  newSessionId?: () => string;
}

export type StartResult =
  | { accepted: true; sessionId: string }
  | { accepted: false; code: 'INVALID_REQUEST' | 'JOB_ALREADY_RUNNING'; reason: string };

export interface StopResult {
  stopped: boolean;
  message: string;
}

export interface SourceDescription {
  name: SourceName;
  available: boolean;
  usage: SourceUsage | null;
}

type Counters = Omit<SessionStats, 'executionTimeSeconds' | 'industry'>;

// Progress bands: collectors share 10-80, drafting 80-95, completion 100.
const COLLECT_START = 10;
const COLLECT_END = 80;
const DRAFT_END = 95;

const emptyPhase = (source: SourceName, status: PhaseStatus, message?: string): PhaseSummary => ({
  source,
  status,
  searches: 0,
  found: 0,
  accepted: 0,
  rejected: 0,
  invalid: 0,
  duplicates: 0,
  saved: 0,
  persistFailures: 0,
  message,
});

export class Orchestrator {
  private policy: IndustryPolicy;
  private collectors: SourceCollector[];
  private worker: Promise<void> = Promise.resolve();

  private readonly job: JobController;
  private readonly store: LeadStore;
  private readonly bindCollectors: CollectorBinder;
  private readonly defaultCities: string[];
  private readonly augmenter: TextAugmenter | null;
  private readonly archive: SessionArchive | null;
  private readonly draftSampleSize: number;
  private readonly limits: RequestLimits;
  private readonly newSessionId: () => string;

  constructor(deps: OrchestratorDeps) {
    this.job = deps.job;
    this.store = deps.store;
    this.bindCollectors = deps.bindCollectors;
    this.defaultCities = [...deps.defaultCities];
    this.augmenter = deps.augmenter ?? null;
    this.archive = deps.archive ?? null;
    this.draftSampleSize = deps.draftSampleSize ?? 5;
    this.limits = deps.limits ?? DEFAULT_LIMITS;
    this.newSessionId = deps.newSessionId ?? randomUUID;
    this.policy = resolveIndustry(deps.industry);
    this.collectors = this.bindCollectors(this.policy);
  }

  start(raw: unknown): StartResult {
    if (this.job.isRunning()) {
      return { accepted: false, code: 'JOB_ALREADY_RUNNING', reason: new JobAlreadyRunningError().message };
    }

    let request: SearchRequest;
    try {
      request = normalizeSearchRequest(
        raw,
        { cities: this.defaultCities, keywords: this.policy.defaultKeywords() },
        this.limits,
      );
    } catch (error) {
      if (error instanceof RequestValidationError) {
        return { accepted: false, code: 'INVALID_REQUEST', reason: error.message };
      }
      throw error;
    }

    const policy = this.policy;
    const collectors = [...this.collectors];
    const run = this.job.tryBegin(this.newSessionId(), policy.name, `Starting ${policy.name} search`);
    if (!run) {
      return { accepted: false, code: 'JOB_ALREADY_RUNNING', reason: new JobAlreadyRunningError().message };
    }

    this.worker = this.execute(run, request, policy, collectors);
    return { accepted: true, sessionId: run.sessionId };
  }

  stop(): StopResult {
    if (!this.job.requestStop()) {
      return { stopped: false, message: 'No search is running' };
    }
    return { stopped: true, message: 'Stop requested; the search will finish at the next checkpoint' };
  }

  /** Resolves once the current worker task has settled. */
  whenIdle(): Promise<void> {
    return this.worker;
  }

  getStatus(): JobStatus {
    return this.job.getStatus();
  }

  getLogs(): JobLogEntry[] {
    return this.job.getLogs();
  }

  getLastResults(): SessionReport | null {
    return this.job.getLastResults();
  }

  currentIndustry(): IndustryKey {
    return this.policy.key;
  }

  industryInfo(): IndustryInfo {
    return this.policy.info();
  }

  listIndustries(): IndustryKey[] {
    return listIndustries();
  }

  changeIndustry(key: string): IndustryInfo {
    if (this.job.isRunning()) {
      throw new JobAlreadyRunningError();
    }
    this.policy = resolveIndustry(key);
    this.collectors = this.bindCollectors(this.policy);
    return this.policy.info();
  }

  async describeSources(): Promise<SourceDescription[]> {
    return Promise.all(
      this.collectors.map(async (collector) => ({
        name: collector.name,
        available: collector.available(),
        usage: collector.usage ? await collector.usage() : null,
      })),
    );
  }

  private async execute(
    run: JobRun,
    request: SearchRequest,
    policy: IndustryPolicy,
    collectors: SourceCollector[],
  ): Promise<void> {
    const startedAt = new Date();
    try {
      const counters: Counters = { searchesPerformed: 0, leadsFound: 0, leadsSaved: 0, messagesDrafted: 0 };
      const batch = new LeadBatch();
      const phases: PhaseSummary[] = [];

      run.progress(COLLECT_START, `Searching ${policy.name} leads`);
      run.log(
        'INFO',
        `Industry ${policy.name}; cities: ${request.cities.join(', ')}; keywords: ${request.keywords.join(', ')}; up to ${request.maxSearches} searches per source`,
      );

      const enabledCount = collectors.filter((collector) => request.sources[collector.name]).length;
      const band = (COLLECT_END - COLLECT_START) / Math.max(1, enabledCount);
      let from = COLLECT_START;
      for (const collector of collectors) {
        if (!request.sources[collector.name]) {
          phases.push(emptyPhase(collector.name, 'skipped', 'disabled for this search'));
          continue;
        }
        if (run.stopRequested()) {
          phases.push(emptyPhase(collector.name, 'cancelled', 'stopped before this source ran'));
        } else {
          phases.push(await this.runPhase(run, collector, request, policy, batch, counters, from, from + band));
        }
        from += band;
        run.progress(from);
      }

      const drafts = await this.draftMessages(run, policy, batch, counters);

      const cancelled = run.stopRequested();
      const finishedAt = new Date();
      const report: SessionReport = {
        sessionId: run.sessionId,
        industry: policy.name,
        industryKey: policy.key,
        outcome: cancelled ? 'cancelled' : 'completed',
        request,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        stats: {
          ...counters,
          executionTimeSeconds: Math.round((finishedAt.getTime() - startedAt.getTime()) / 100) / 10,
          industry: policy.name,
        },
        phases,
        leads: batch.all(),
        drafts,
      };

      if (cancelled) {
        run.cancel(report, `Search stopped: ${counters.leadsSaved} new leads saved before the stop`);
        return;
      }

      if (this.archive) {
        try {
          report.archivePath = await this.archive.write(report);
          run.log('INFO', `Session saved to ${report.archivePath}`);
        } catch (error) {
          run.log('WARN', `Could not archive session: ${describeError(error)}`);
        }
      }
      run.complete(
        report,
        `Search completed: ${counters.leadsFound} leads found, ${counters.leadsSaved} new, ${counters.messagesDrafted} messages drafted`,
      );
    } catch (error) {
      run.fail(new OrchestratorFaultError(error));
    }
  }

  private async runPhase(
    run: JobRun,
    collector: SourceCollector,
    request: SearchRequest,
    policy: IndustryPolicy,
    batch: LeadBatch,
    counters: Counters,
    progressFrom: number,
    progressTo: number,
  ): Promise<PhaseSummary> {
    const name = collector.name;
    const summary = emptyPhase(name, 'completed');
    const failPhase = (error: unknown): PhaseSummary => {
      const failure = new SourceUnavailableError(name, error);
      run.log('ERROR', failure.message);
      return { ...summary, status: 'failed', message: failure.message };
    };

    let ready: boolean;
    try {
      ready = collector.available();
    } catch (error) {
      return failPhase(error);
    }
    if (!ready) {
      const missing = new ConfigurationMissingError(name);
      run.log('INFO', `${missing.message}, skipping`);
      return emptyPhase(name, 'skipped', missing.message);
    }

    run.log('INFO', `Searching ${name}...`);
    try {
      const candidates = await collector.search(request.cities, request.keywords, request.maxSearches, {
        shouldStop: () => run.stopRequested(),
        onSearch: ({ completed, planned, keyword, city }) => {
          summary.searches = completed;
          counters.searchesPerformed += 1;
          run.updateCounts({ searchesPerformed: counters.searchesPerformed });
          run.progress(
            progressFrom + ((progressTo - progressFrom) * completed) / planned,
            `${name}: "${keyword}" in ${city} (${completed}/${planned})`,
          );
        },
      });
      summary.found = candidates.length;
      await this.admit(run, candidates, policy, batch, counters, summary);
    } catch (error) {
      return failPhase(error);
    } finally {
      run.updateCounts({ leadsFound: counters.leadsFound, leadsSaved: counters.leadsSaved });
    }

    if (run.stopRequested()) summary.status = 'cancelled';
    run.log(
      'SUCCESS',
      `${name}: ${summary.found} found, ${summary.saved} new, ${summary.duplicates} duplicates, ${summary.rejected} rejected`,
    );
    return summary;
  }

  // Validate, deduplicate and persist one collector's candidates, in order.
  private async admit(
    run: JobRun,
    candidates: LeadCandidate[],
    policy: IndustryPolicy,
    batch: LeadBatch,
    counters: Counters,
    summary: PhaseSummary,
  ): Promise<void> {
    for (const candidate of candidates) {
      if (!hasDisplayName(candidate)) {
        summary.invalid += 1;
        continue;
      }
      let valid: boolean;
      try {
        valid = policy.validate(candidate);
      } catch (error) {
        valid = false;
        run.log('WARN', `Could not validate "${candidate.displayName}": ${describeError(error)}`);
      }
      if (!valid) {
        summary.rejected += 1;
        continue;
      }
      summary.accepted += 1;
      counters.leadsFound += 1;

      try {
        const resolution = await resolveDuplicate(candidate, batch, this.store);
        if (resolution.kind === 'batch') {
          summary.duplicates += 1;
          continue;
        }
        if (resolution.kind === 'store') {
          summary.duplicates += 1;
          batch.add({ ...candidate, id: resolution.id, isNew: false });
          continue;
        }

        const id = await this.store.insert({ ...candidate, status: 'pending' });
        batch.add({ ...candidate, id, isNew: true });
        summary.saved += 1;
        counters.leadsSaved += 1;
      } catch (error) {
        summary.persistFailures += 1;
        run.log('WARN', new PersistenceFailureError(candidate.displayName, error).message);
      }
    }
  }

  private async draftMessages(
    run: JobRun,
    policy: IndustryPolicy,
    batch: LeadBatch,
    counters: Counters,
  ): Promise<DraftedMessage[]> {
    const drafts: DraftedMessage[] = [];
    if (!this.augmenter) {
      run.log('INFO', 'No text augmenter configured, skipping message drafting');
      return drafts;
    }
    if (run.stopRequested()) return drafts;

    const sample = batch.all().slice(0, this.draftSampleSize);
    if (sample.length === 0) return drafts;

    run.progress(COLLECT_END, `Drafting messages for ${sample.length} leads`);
    for (const [index, lead] of sample.entries()) {
      if (run.stopRequested()) break;

      let content: string;
      try {
        content = await this.augmenter.draft(policy.buildEmailContext(lead));
      } catch (error) {
        run.log('WARN', `Draft for "${lead.displayName}" failed: ${describeError(error)}`);
        continue;
      }

      drafts.push({
        leadId: lead.id,
        leadName: lead.displayName,
        content,
        industry: policy.name,
        generatedAt: new Date().toISOString(),
      });
      counters.messagesDrafted += 1;
      run.updateCounts({ messagesDrafted: counters.messagesDrafted });

      try {
        await this.store.insertDraft({
          leadId: lead.id,
          content,
          industry: policy.name,
          generatedBy: this.augmenter.name,
        });
      } catch (error) {
        run.log('WARN', `Could not store draft for "${lead.displayName}": ${describeError(error)}`);
      }
      run.progress(COLLECT_END + ((DRAFT_END - COLLECT_END) * (index + 1)) / sample.length);
    }
    run.log('INFO', `${drafts.length} of ${sample.length} messages drafted`);
    return drafts;
  }
}
