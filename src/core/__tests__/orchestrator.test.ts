import test from 'node:test';
import assert from 'node:assert/strict';
import { SourceCollector } from '../../collectors/common';
import { MemoryLeadStore } from '../../store/memoryLeadStore';
import { NewLeadRecord } from '../types';
import { JobAlreadyRunningError } from '../errors';
import { JobController, JobRun } from '../jobController';
import { Orchestrator, OrchestratorDeps } from '../orchestrator';
import { deferred, FakeArchive, FakeAugmenter, FakeCollector, Responder } from './helpers';

const none: Responder = () => [];

const setup = (
  collectors: SourceCollector[],
  overrides: Partial<OrchestratorDeps> = {},
) => {
  const job = new JobController();
  const store = new MemoryLeadStore();
  const bound: string[] = [];
  let sessions = 0;
  const orchestrator = new Orchestrator({
    job,
    store,
    bindCollectors: (policy) => {
      bound.push(policy.key);
      return collectors;
    },
    defaultCities: ['madrid'],
    newSessionId: () => {
      sessions += 1;
      return `session-${sessions}`;
    },
    ...overrides,
  });
  return { job, store, orchestrator, bound };
};

const oneSearch = { cities: ['madrid'], keywords: ['botox'], maxSearches: 1 };

test('runs collectors in order, validating and deduplicating before persisting', async () => {
  const serp = new FakeCollector('serpapi', () => [
    { displayName: 'Clínica Botox Madrid', description: 'aesthetic clinic', canonicalUrl: 'https://botox.example' },
    { displayName: 'Hospital General', description: 'public hospital' },
    { displayName: '' },
    { displayName: 'clínica  botox madrid', description: 'botox' },
    { displayName: 'Beauty Clinic Norte' },
  ]);
  const linked = new FakeCollector('linkedin', () => [
    { displayName: 'Derma Filler Studio', canonicalUrl: 'https://botox.example' },
    { displayName: 'Skin Care Lab', description: 'facial treatment' },
  ]);
  const { orchestrator, store, job } = setup([serp, linked]);
  const seeded: NewLeadRecord = {
    displayName: 'Beauty Clinic Norte',
    sourceName: 'manual',
    searchTermUsed: '',
    industryName: 'Medical Aesthetics',
    extractionMethod: 'manual-entry',
    foundAt: '2026-01-01T00:00:00.000Z',
    status: 'pending',
  };
  await store.insert(seeded);

  const started = orchestrator.start(oneSearch);
  assert.deepEqual(started, { accepted: true, sessionId: 'session-1' });
  await orchestrator.whenIdle();

  const report = orchestrator.getLastResults();
  assert.ok(report);
  assert.equal(report.outcome, 'completed');
  assert.equal(report.sessionId, 'session-1');
  assert.equal(report.industryKey, 'medical_aesthetics');
  assert.deepEqual(
    report.phases.map(({ source, status, searches, found, accepted, rejected, invalid, duplicates, saved, persistFailures }) => ({
      source,
      status,
      searches,
      found,
      accepted,
      rejected,
      invalid,
      duplicates,
      saved,
      persistFailures,
    })),
    [
      { source: 'serpapi', status: 'completed', searches: 1, found: 5, accepted: 3, rejected: 1, invalid: 1, duplicates: 2, saved: 1, persistFailures: 0 },
      { source: 'linkedin', status: 'completed', searches: 1, found: 2, accepted: 2, rejected: 0, invalid: 0, duplicates: 1, saved: 1, persistFailures: 0 },
    ],
  );
  assert.deepEqual(
    report.leads.map((lead) => [lead.id, lead.displayName, lead.isNew]),
    [
      [2, 'Clínica Botox Madrid', true],
      [1, 'Beauty Clinic Norte', false],
      [3, 'Skin Care Lab', true],
    ],
  );
  assert.equal(report.stats.searchesPerformed, 2);
  assert.equal(report.stats.leadsFound, 5);
  assert.equal(report.stats.leadsSaved, 2);
  assert.equal(report.stats.industry, 'Medical Aesthetics');
  assert.equal(store.list().length, 3);

  const status = job.getStatus();
  assert.equal(status.isRunning, false);
  assert.equal(status.progress, 100);
  assert.equal(status.lastOutcome, 'completed');
  assert.deepEqual(status.counts, { searchesPerformed: 2, leadsFound: 5, leadsSaved: 2, messagesDrafted: 0 });
});

test('an unavailable collector is skipped with an informational log only', async () => {
  const serp = new FakeCollector('serpapi', none, () => false);
  const linked = new FakeCollector('linkedin', () => [{ displayName: 'Botox Lab' }]);
  const { orchestrator } = setup([serp, linked]);

  orchestrator.start({ ...oneSearch, sources: { linkedin: false } });
  await orchestrator.whenIdle();

  const report = orchestrator.getLastResults();
  assert.ok(report);
  assert.equal(report.outcome, 'completed');
  assert.equal(report.stats.leadsSaved, 0);
  assert.deepEqual(
    report.phases.map((phase) => [phase.source, phase.status, phase.message]),
    [
      ['serpapi', 'skipped', 'serpapi is not configured'],
      ['linkedin', 'skipped', 'disabled for this search'],
    ],
  );
  assert.equal(linked.searches.length, 0);
  const logs = orchestrator.getLogs();
  assert.ok(logs.some((entry) => entry.level === 'INFO' && entry.message === 'serpapi is not configured, skipping'));
  assert.deepEqual(logs.filter((entry) => entry.level === 'WARN' || entry.level === 'ERROR'), []);
});

test('a second start while running is rejected without touching the job', async () => {
  const gate = deferred();
  const serp = new FakeCollector('serpapi', async () => {
    await gate.promise;
    return [];
  });
  const { orchestrator } = setup([serp]);

  assert.equal(orchestrator.start(oneSearch).accepted, true);
  const logsBefore = orchestrator.getLogs();

  assert.deepEqual(orchestrator.start(oneSearch), {
    accepted: false,
    code: 'JOB_ALREADY_RUNNING',
    reason: 'A search job is already in progress',
  });
  assert.equal(orchestrator.getStatus().sessionId, 'session-1');
  assert.deepEqual(orchestrator.getLogs(), logsBefore);

  gate.release();
  await orchestrator.whenIdle();
  assert.deepEqual(orchestrator.start(oneSearch), { accepted: true, sessionId: 'session-2' });
  await orchestrator.whenIdle();
});

test('an invalid request is rejected before any state changes', () => {
  const { orchestrator } = setup([new FakeCollector('serpapi', none)]);

  assert.deepEqual(orchestrator.start({ maxSearches: 0 }), {
    accepted: false,
    code: 'INVALID_REQUEST',
    reason: 'maxSearches must be an integer between 1 and 10',
  });
  assert.equal(orchestrator.getStatus().statusMessage, 'System ready');
  assert.deepEqual(orchestrator.getLogs(), []);
});

test('stop is honoured at the next checkpoint and partial results are kept', async () => {
  const archive = new FakeArchive();
  let orchestrator: Orchestrator | undefined;
  const serp = new FakeCollector('serpapi', (_, index) => {
    if (index === 0) orchestrator?.stop();
    return [{ displayName: `Botox Clinic ${index + 1}` }];
  });
  const linked = new FakeCollector('linkedin', () => [{ displayName: 'Filler Studio' }]);
  const context = setup([serp, linked], { archive });
  orchestrator = context.orchestrator;

  orchestrator.start({ cities: ['madrid'], keywords: ['botox', 'fillers', 'laser'], maxSearches: 3 });
  await orchestrator.whenIdle();

  assert.equal(serp.searches.length, 1);
  assert.equal(linked.searches.length, 0);
  const report = orchestrator.getLastResults();
  assert.ok(report);
  assert.equal(report.outcome, 'cancelled');
  assert.deepEqual(report.leads.map((lead) => lead.displayName), ['Botox Clinic 1']);
  assert.deepEqual(
    report.phases.map((phase) => [phase.source, phase.status]),
    [
      ['serpapi', 'cancelled'],
      ['linkedin', 'cancelled'],
    ],
  );
  assert.equal(context.store.list().length, 1);
  assert.equal(archive.written.length, 0);
  assert.equal(report.archivePath, undefined);

  const status = orchestrator.getStatus();
  assert.equal(status.isRunning, false);
  assert.equal(status.lastOutcome, 'cancelled');
});

// Progress reporting breaks once `broken` is set, which faults the worker itself.
class BrittleJob extends JobController {
  broken = false;

  tryBegin(sessionId: string, industry: string, message?: string): JobRun | null {
    const run = super.tryBegin(sessionId, industry, message);
    if (!run || !this.broken) return run;
    return {
      ...run,
      progress: () => {
        throw new Error('progress sink closed');
      },
    };
  }
}

test('an orchestration fault fails the job and keeps the previous report', async () => {
  const job = new BrittleJob();
  const serp = new FakeCollector('serpapi', () => [{ displayName: 'Botox Bar' }]);
  const { orchestrator } = setup([serp], { job });

  orchestrator.start(oneSearch);
  await orchestrator.whenIdle();
  const previous = orchestrator.getLastResults();
  assert.ok(previous);

  job.broken = true;
  orchestrator.start(oneSearch);
  await orchestrator.whenIdle();

  const status = orchestrator.getStatus();
  assert.equal(status.isRunning, false);
  assert.equal(status.lastOutcome, 'failed');
  assert.equal(status.progress, 0);
  assert.equal(status.statusMessage, 'Error: progress sink closed');
  assert.deepEqual(orchestrator.getLastResults(), previous);
  assert.equal(serp.searches.length, 1);
  assert.ok(orchestrator.getLogs().some((entry) => entry.level === 'ERROR'));
});

test('a collector that throws while checking availability fails only its phase', async () => {
  const serp = new FakeCollector('serpapi', none, () => {
    throw new Error('driver missing');
  });
  const linked = new FakeCollector('linkedin', () => [{ displayName: 'Filler Studio' }]);
  const { orchestrator, store } = setup([serp, linked]);

  orchestrator.start(oneSearch);
  await orchestrator.whenIdle();

  const report = orchestrator.getLastResults();
  assert.ok(report);
  assert.equal(report.outcome, 'completed');
  assert.deepEqual(
    report.phases.map((phase) => [phase.source, phase.status, phase.message]),
    [
      ['serpapi', 'failed', 'serpapi unavailable: driver missing'],
      ['linkedin', 'completed', undefined],
    ],
  );
  assert.equal(linked.searches.length, 1);
  assert.equal(store.list().length, 1);
  assert.equal(orchestrator.getStatus().lastOutcome, 'completed');
  assert.ok(
    orchestrator.getLogs().some((entry) => entry.level === 'ERROR' && entry.message === 'serpapi unavailable: driver missing'),
  );
});

test('a validation error rejects only that candidate', async () => {
  const serp = new FakeCollector('serpapi', () => [
    { displayName: 'Botox Bar', description: 'aesthetic clinic' },
    { displayName: 'Filler Studio' },
  ]);
  const { orchestrator, store } = setup([serp], {
    bindCollectors: (policy) => {
      const validate = policy.validate.bind(policy);
      policy.validate = (candidate) => {
        if (candidate.displayName === 'Botox Bar') throw new Error('indicator list unreadable');
        return validate(candidate);
      };
      return [serp];
    },
  });

  orchestrator.start(oneSearch);
  await orchestrator.whenIdle();

  const report = orchestrator.getLastResults();
  assert.ok(report);
  assert.equal(report.outcome, 'completed');
  assert.equal(report.phases[0].status, 'completed');
  assert.equal(report.phases[0].rejected, 1);
  assert.equal(report.phases[0].saved, 1);
  assert.deepEqual(store.list().map((lead) => lead.displayName), ['Filler Studio']);
  assert.ok(
    orchestrator
      .getLogs()
      .some((entry) => entry.level === 'WARN' && entry.message === 'Could not validate "Botox Bar": indicator list unreadable'),
  );
});

test('a failing collector degrades only its own phase', async () => {
  const serp = new FakeCollector('serpapi', () => {
    throw new Error('connection reset');
  });
  const linked = new FakeCollector('linkedin', () => [{ displayName: 'Filler Studio' }]);
  const { orchestrator } = setup([serp, linked]);

  orchestrator.start(oneSearch);
  await orchestrator.whenIdle();

  const report = orchestrator.getLastResults();
  assert.ok(report);
  assert.equal(report.outcome, 'completed');
  assert.equal(report.phases[0].status, 'failed');
  assert.equal(report.phases[0].message, 'serpapi unavailable: connection reset');
  assert.equal(report.phases[1].saved, 1);
});

test('a persistence failure drops only that lead', async () => {
  class FlakyStore extends MemoryLeadStore {
    async insert(fields: NewLeadRecord): Promise<number> {
      if (fields.displayName === 'Broken Botox') throw new Error('disk full');
      return super.insert(fields);
    }
  }
  const serp = new FakeCollector('serpapi', () => [{ displayName: 'Broken Botox' }, { displayName: 'Working Botox' }]);
  const { orchestrator } = setup([serp], { store: new FlakyStore() });

  orchestrator.start(oneSearch);
  await orchestrator.whenIdle();

  const report = orchestrator.getLastResults();
  assert.ok(report);
  assert.equal(report.outcome, 'completed');
  assert.equal(report.phases[0].persistFailures, 1);
  assert.equal(report.stats.leadsSaved, 1);
  assert.ok(orchestrator.getLogs().some((entry) => entry.message === 'could not persist "Broken Botox": disk full'));
});

test('drafts messages for a bounded sample and skips failed drafts', async () => {
  const serp = new FakeCollector('serpapi', () => [
    { displayName: 'Botox One' },
    { displayName: 'Botox Two' },
    { displayName: 'Botox Three' },
  ]);
  const augmenter = new FakeAugmenter(['Botox One']);
  const { orchestrator, store } = setup([serp], { augmenter, draftSampleSize: 2 });

  orchestrator.start(oneSearch);
  await orchestrator.whenIdle();

  const report = orchestrator.getLastResults();
  assert.ok(report);
  assert.deepEqual(augmenter.contexts.map((context) => context.leadName), ['Botox One', 'Botox Two']);
  assert.deepEqual(report.drafts.map((draft) => [draft.leadId, draft.content]), [[2, 'Hola Botox Two']]);
  assert.equal(report.stats.messagesDrafted, 1);
  assert.deepEqual(
    store.listDrafts().map((draft) => [draft.leadId, draft.generatedBy, draft.industry]),
    [[2, 'fake-writer', 'Medical Aesthetics']],
  );
});

test('archives completed sessions and survives archive failures', async () => {
  const archive = new FakeArchive();
  const first = setup([new FakeCollector('serpapi', () => [{ displayName: 'Botox Bar' }])], { archive });
  first.orchestrator.start(oneSearch);
  await first.orchestrator.whenIdle();
  assert.equal(first.orchestrator.getLastResults()?.archivePath, 'sessions/session-1.json');
  assert.equal(archive.written.length, 1);

  const failing = setup([new FakeCollector('serpapi', none)], { archive: new FakeArchive(new Error('read-only')) });
  failing.orchestrator.start(oneSearch);
  await failing.orchestrator.whenIdle();
  assert.equal(failing.orchestrator.getStatus().lastOutcome, 'completed');
  assert.ok(failing.orchestrator.getLogs().some((entry) => entry.message === 'Could not archive session: read-only'));
});

test('progress only moves forward during a run', async () => {
  const seen: number[] = [];
  let orchestrator: Orchestrator | undefined;
  const record = () => {
    if (orchestrator) seen.push(orchestrator.getStatus().progress);
    return [];
  };
  const context = setup([new FakeCollector('serpapi', record), new FakeCollector('linkedin', record)]);
  orchestrator = context.orchestrator;

  orchestrator.start({ cities: ['madrid', 'valencia'], keywords: ['botox'], maxSearches: 2 });
  await orchestrator.whenIdle();
  seen.push(orchestrator.getStatus().progress);

  assert.deepEqual(seen, [10, 28, 45, 63, 100]);
});

test('industry changes are refused while a search runs', async () => {
  const gate = deferred();
  const serp = new FakeCollector('serpapi', async () => {
    await gate.promise;
    return [];
  });
  const { orchestrator, bound } = setup([serp]);

  orchestrator.start(oneSearch);
  assert.throws(() => orchestrator.changeIndustry('real_estate'), JobAlreadyRunningError);
  gate.release();
  await orchestrator.whenIdle();

  assert.equal(orchestrator.changeIndustry('real_estate').key, 'real_estate');
  assert.equal(orchestrator.currentIndustry(), 'real_estate');
  assert.equal(orchestrator.changeIndustry('no_such_industry').key, 'medical_aesthetics');
  assert.deepEqual(bound, ['medical_aesthetics', 'real_estate', 'medical_aesthetics']);
});

test('describes each bound source', async () => {
  const { orchestrator } = setup([
    new FakeCollector('serpapi', none, () => true, { used: 10, remaining: 90, limit: 100 }),
    new FakeCollector('linkedin', none, () => false),
  ]);

  assert.deepEqual(await orchestrator.describeSources(), [
    { name: 'serpapi', available: true, usage: { used: 10, remaining: 90, limit: 100 } },
    { name: 'linkedin', available: false, usage: null },
  ]);
});
