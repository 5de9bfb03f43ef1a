import fs from 'fs/promises';
import path from 'path';
import { SessionReport } from './types';

export interface SessionArchive {
  write(report: SessionReport): Promise<string>;
}

const compactStamp = (iso: string): string => `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 16).replace(':', '')}`;

export const archiveFileName = (report: SessionReport): string =>
  `session_${report.industryKey}_${compactStamp(new Date(report.finishedAt).toISOString())}_${report.sessionId.slice(0, 8)}.json`;

export class FileSessionArchive implements SessionArchive {
  constructor(private readonly directory: string) {}

  async write(report: SessionReport): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });
    const filePath = path.join(this.directory, archiveFileName(report));
    await fs.writeFile(filePath, `${JSON.stringify({ ...report, archivePath: filePath }, null, 2)}\n`, 'utf8');
    return filePath;
  }
}
