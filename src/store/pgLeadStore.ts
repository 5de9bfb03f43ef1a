import fs from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import { normalizeName, normalizeUrl } from '../core/identity';
import { Lead, LeadId, LeadSource, LeadStatus, NewLeadRecord } from '../core/types';
import { log } from '../utils/logger';
import { isRecord } from '../utils/records';
import { DraftRecord, LeadGroupField, LeadStore } from './leadStore';

export type SqlRunner = (text: string, params: unknown[]) => Promise<{ rows: unknown[] }>;

export const LEAD_COLUMNS: Record<keyof NewLeadRecord, string> = {
  displayName: 'display_name',
  canonicalUrl: 'canonical_url',
  description: 'description',
  location: 'location',
  sourceName: 'source_name',
  searchTermUsed: 'search_term',
  industryName: 'industry_name',
  extractionMethod: 'extraction_method',
  foundAt: 'found_at',
  email: 'email',
  phone: 'phone',
  status: 'status',
};

const LEAD_FIELDS: ReadonlyArray<keyof NewLeadRecord> = [
  'displayName',
  'canonicalUrl',
  'description',
  'location',
  'sourceName',
  'searchTermUsed',
  'industryName',
  'extractionMethod',
  'foundAt',
  'email',
  'phone',
  'status',
];

const GROUP_COLUMNS: Record<LeadGroupField, string> = {
  sourceName: 'source_name',
  status: 'status',
  industryName: 'industry_name',
};

// Identity keys come from normalizeName/normalizeUrl, never from SQL string functions.
const IDENTITY_COLUMNS = ['name_key', 'url_key'];

const INSERT_COLUMNS = [...LEAD_FIELDS.map((field) => LEAD_COLUMNS[field]), ...IDENTITY_COLUMNS];

const INSERT_LEAD_SQL = `INSERT INTO leads (${INSERT_COLUMNS.join(', ')})
VALUES (${INSERT_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})
RETURNING id`;

const FIND_BY_IDENTITY_SQL = `SELECT id FROM leads
WHERE name_key = $1
   OR ($2 <> '' AND url_key = $2)
ORDER BY id
LIMIT 1`;

const INSERT_DRAFT_SQL = `INSERT INTO generated_messages (lead_id, content, industry, generated_by)
VALUES ($1, $2, $3, $4)
RETURNING id`;

const LEAD_STATUSES: readonly LeadStatus[] = ['pending', 'contacted', 'responded', 'converted', 'discarded'];
const LEAD_SOURCES: readonly LeadSource[] = ['serpapi', 'linkedin', 'manual'];

const readField = (row: unknown, key: string): unknown => (isRecord(row) ? row[key] : undefined);

const readString = (row: unknown, key: string): string | undefined => {
  const value = readField(row, key);
  if (value === null || value === undefined) return undefined;
  if (value instanceof Date) return value.toISOString();
  return String(value);
};

const readId = (row: unknown, key = 'id'): number => {
  const id = Number(readField(row, key));
  if (!Number.isFinite(id)) throw new Error(`row is missing numeric ${key}`);
  return id;
};

export const rowToLead = (row: unknown): Lead => {
  const status = readString(row, 'status');
  const source = readString(row, 'source_name');
  return {
    id: readId(row),
    displayName: readString(row, 'display_name') ?? '',
    canonicalUrl: readString(row, 'canonical_url'),
    description: readString(row, 'description'),
    location: readString(row, 'location'),
    sourceName: LEAD_SOURCES.find((candidate) => candidate === source) ?? 'manual',
    searchTermUsed: readString(row, 'search_term') ?? '',
    industryName: readString(row, 'industry_name') ?? '',
    extractionMethod: readString(row, 'extraction_method') ?? '',
    foundAt: readString(row, 'found_at') ?? '',
    email: readString(row, 'email'),
    phone: readString(row, 'phone'),
    status: LEAD_STATUSES.find((candidate) => candidate === status) ?? 'pending',
  };
};

export class PgLeadStore implements LeadStore {
  constructor(
    private readonly run: SqlRunner,
    private readonly onClose: () => Promise<void> = async () => undefined,
  ) {}

  static connect(connectionString: string): PgLeadStore {
    const pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
    pool.on('error', (err) => {
      log('ERROR', 'Unexpected database pool error', err.message);
    });
    return new PgLeadStore(
      (text, params) => pool.query(text, params),
      () => pool.end(),
    );
  }

  async ensureSchema(schemaPath = path.resolve(process.cwd(), 'sql', 'schema.sql')): Promise<void> {
    const ddl = await fs.readFile(schemaPath, 'utf8');
    await this.run(ddl, []);
  }

  async findByIdentity(displayName: string, canonicalUrl?: string): Promise<LeadId | null> {
    const { rows } = await this.run(FIND_BY_IDENTITY_SQL, [normalizeName(displayName), normalizeUrl(canonicalUrl)]);
    return rows.length > 0 ? readId(rows[0]) : null;
  }

  async insert(fields: NewLeadRecord): Promise<LeadId> {
    const values = [
      ...LEAD_FIELDS.map((field) => fields[field] ?? null),
      normalizeName(fields.displayName),
      normalizeUrl(fields.canonicalUrl),
    ];
    const { rows } = await this.run(INSERT_LEAD_SQL, values);
    if (rows.length === 0) throw new Error('insert returned no id');
    return readId(rows[0]);
  }

  async listRecent(limit: number, status?: LeadStatus): Promise<Lead[]> {
    const { rows } = status
      ? await this.run('SELECT * FROM leads WHERE status = $2 ORDER BY found_at DESC, id DESC LIMIT $1', [limit, status])
      : await this.run('SELECT * FROM leads ORDER BY found_at DESC, id DESC LIMIT $1', [limit]);
    return rows.map(rowToLead);
  }

  async aggregateCounts(groupField: LeadGroupField): Promise<Record<string, number>> {
    const column = GROUP_COLUMNS[groupField];
    const { rows } = await this.run(
      `SELECT COALESCE(${column}, 'unknown') AS key, COUNT(*)::int AS count FROM leads GROUP BY 1 ORDER BY 1`,
      [],
    );
    const counts: Record<string, number> = {};
    for (const row of rows) {
      counts[readString(row, 'key') ?? 'unknown'] = Number(readField(row, 'count') ?? 0);
    }
    return counts;
  }

  async insertDraft(draft: DraftRecord): Promise<number> {
    const { rows } = await this.run(INSERT_DRAFT_SQL, [draft.leadId, draft.content, draft.industry, draft.generatedBy]);
    if (rows.length === 0) throw new Error('draft insert returned no id');
    return readId(rows[0]);
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
