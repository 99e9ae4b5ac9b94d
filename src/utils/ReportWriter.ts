import { writeFile } from 'fs/promises';
import type { IReport } from '../models';

/**
 * Write a report as 2-space indented JSON (UTF-8, non-ASCII kept as is)
 */
export async function writeReport(path: string, report: IReport): Promise<void> {
  await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
}
