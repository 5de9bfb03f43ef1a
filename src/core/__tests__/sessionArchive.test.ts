import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { archiveFileName, FileSessionArchive } from '../sessionArchive';
import { sampleReport } from './helpers';

test('archive names carry industry, finish time and short session id', () => {
  assert.equal(archiveFileName(sampleReport()), 'session_medical_aesthetics_20260304_0907_a1b2c3d4.json');
});

test('writes the full report as JSON', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'lead-sessions-'));
  try {
    const archive = new FileSessionArchive(join(dir, 'nested'));
    const report = sampleReport({ outcome: 'completed' });

    const filePath = await archive.write(report);

    assert.equal(filePath, join(dir, 'nested', 'session_medical_aesthetics_20260304_0907_a1b2c3d4.json'));
    const saved: unknown = JSON.parse(await readFile(filePath, 'utf8'));
    assert.deepEqual(saved, { ...report, archivePath: filePath });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
