import express, { Express, NextFunction, Request, Response } from 'express';
import { describeError, JobAlreadyRunningError, RequestValidationError } from '../core/errors';
import { addManualLead, parseManualLead } from '../core/manualLead';
import { Orchestrator } from '../core/orchestrator';
import { summarizeReport } from '../core/report';
import { LeadStore } from '../store/leadStore';
import { log } from '../utils/logger';

export type StorageKind = 'postgres' | 'memory';

export interface AppDeps {
  orchestrator: Orchestrator;
  store: LeadStore;
  storage: StorageKind;
  apiKey?: string;
}

interface StoreTotals {
  databaseConnected: boolean;
  totalLeads: number;
  leadsBySource: Record<string, number>;
}

const RECENT_LEAD_COUNT = 10;

const sumCounts = (counts: Record<string, number>): number => Object.values(counts).reduce((total, n) => total + n, 0);

export const createApp = ({ orchestrator, store, storage, apiKey }: AppDeps): Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  const requireApiKey = (req: Request, res: Response, next: NextFunction): void => {
    if (apiKey && req.header('x-api-key') !== apiKey) {
      res.status(401).json({ success: false, error: 'Unauthorized' });
      return;
    }
    next();
  };

  const serverError = (res: Response, context: string, error: unknown): void => {
    log('ERROR', `${context} failed`, describeError(error));
    res.status(500).json({ success: false, error: describeError(error) });
  };

  app.get('/health', (_, res) => {
    res.json({ ok: true, service: 'lead-aggregator' });
  });

  app.get('/api/status', async (_, res: Response) => {
    let totals: StoreTotals = { databaseConnected: false, totalLeads: 0, leadsBySource: {} };
    try {
      const leadsBySource = await store.aggregateCounts('sourceName');
      totals = { databaseConnected: true, totalLeads: sumCounts(leadsBySource), leadsBySource };
    } catch (error) {
      log('WARN', 'lead store unreachable while reading status', describeError(error));
    }
    res.json({
      ...orchestrator.getStatus(),
      currentIndustry: orchestrator.currentIndustry(),
      storage,
      ...totals,
    });
  });

  app.get('/api/logs', (_, res) => {
    const status = orchestrator.getStatus();
    res.json({
      logs: orchestrator.getLogs(),
      isRunning: status.isRunning,
      progress: status.progress,
      statusMessage: status.statusMessage,
    });
  });

  app.post('/api/start_search', requireApiKey, (req: Request, res: Response) => {
    try {
      const result = orchestrator.start(req.body);
      if (result.accepted) {
        res.status(202).json(result);
        return;
      }
      res.status(result.code === 'JOB_ALREADY_RUNNING' ? 409 : 400).json({
        accepted: false,
        code: result.code,
        error: result.reason,
      });
    } catch (error) {
      serverError(res, 'start search', error);
    }
  });

  app.post('/api/stop_search', requireApiKey, (_, res) => {
    res.json(orchestrator.stop());
  });

  app.get('/api/results', (_, res) => {
    const report = orchestrator.getLastResults();
    if (!report) {
      res.status(404).json({ success: false, error: 'No results available yet' });
      return;
    }
    res.json(summarizeReport(report));
  });

  app.get('/api/industries', (_, res) => {
    res.json({ industries: orchestrator.listIndustries(), current: orchestrator.currentIndustry() });
  });

  app.get('/api/industry_info', (_, res) => {
    res.json(orchestrator.industryInfo());
  });

  app.post('/api/change_industry', requireApiKey, (req: Request, res: Response) => {
    const industry: unknown = req.body?.industry;
    if (typeof industry !== 'string' || !industry.trim()) {
      res.status(400).json({ success: false, error: 'industry is required' });
      return;
    }
    try {
      res.json({ success: true, industry: orchestrator.changeIndustry(industry) });
    } catch (error) {
      if (error instanceof JobAlreadyRunningError) {
        res.status(409).json({ success: false, error: error.message });
        return;
      }
      serverError(res, 'change industry', error);
    }
  });

  app.get('/api/sources', async (_, res: Response) => {
    try {
      res.json({ sources: await orchestrator.describeSources() });
    } catch (error) {
      serverError(res, 'describe sources', error);
    }
  });

  app.get('/api/database_stats', async (_, res: Response) => {
    try {
      const [bySource, byStatus, recent] = await Promise.all([
        store.aggregateCounts('sourceName'),
        store.aggregateCounts('status'),
        store.listRecent(RECENT_LEAD_COUNT),
      ]);
      res.json({ storage, totalLeads: sumCounts(bySource), bySource, byStatus, recent });
    } catch (error) {
      serverError(res, 'database stats', error);
    }
  });

  app.post('/api/leads', requireApiKey, async (req: Request, res: Response) => {
    try {
      const input = parseManualLead(req.body);
      const result = await addManualLead(store, input, { industry: orchestrator.currentIndustry() });
      res.status(result.created ? 201 : 200).json(result);
    } catch (error) {
      if (error instanceof RequestValidationError) {
        res.status(400).json({ success: false, error: error.message });
        return;
      }
      serverError(res, 'add lead', error);
    }
  });

  return app;
};
