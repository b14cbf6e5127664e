// CSV export of scan results: one row per action item

import { writeFile } from 'node:fs/promises';
import type { ScanResult } from '../types/scan.js';
import { ValidationError } from './errors.js';

export const CSV_HEADER = [
  'Fund Name',
  'Status',
  'Risk Level',
  'Risk Score',
  'Report Length',
  'Action Item Number',
  'Action Item',
] as const;

/** RFC 4180: quote fields containing a comma, quote or line break; double embedded quotes. */
export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(results: readonly ScanResult[]): string {
  if (results.length === 0) {
    throw new ValidationError('No scan results to export', ['results: must not be empty']);
  }

  const rows: Array<Array<string | number>> = [[...CSV_HEADER]];
  for (const r of results) {
    const base = [
      r.fundName,
      r.status,
      r.riskAnalysis?.overallRiskLevel ?? '',
      r.riskAnalysis?.riskScore ?? '',
      r.report.length,
    ];
    if (r.actionItems.length === 0) {
      rows.push([...base, 0, 'No action items']);
    } else {
      r.actionItems.forEach((item, i) => rows.push([...base, i + 1, item]));
    }
  }
  return rows.map((row) => row.map(csvField).join(',')).join('\r\n') + '\r\n';
}

export async function exportResultsToCsv(results: readonly ScanResult[], path: string): Promise<string> {
  if (!path.trim()) {
    throw new ValidationError('Export path must not be blank', ['path: must not be blank']);
  }
  const csv = toCsv(results);
  await writeFile(path, csv, 'utf-8');
  return path;
}
