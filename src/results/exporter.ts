import fs from 'fs/promises';
import { z } from 'zod';
import { HTSError, HTSErrorCode, describeError } from '../shared/errors.js';
import type { RunSummary } from './types.js';

export interface ExportMetadata {
  timestamp: Date;
  rootPath: string;
}

const exportedTestSchema = z.object({
  name: z.string(),
  status: z.enum(['PASS', 'FAIL']),
});

export type ExportedTest = z.infer<typeof exportedTestSchema>;

export const exportDocumentSchema = z.object({
  timestamp: z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/),
  project_root: z.string(),
  results: z.object({
    simulation: z.array(exportedTestSchema),
    synthesis: z.object({ count: z.number().int().nonnegative() }),
    coverage: z.object({ count: z.number().int().nonnegative() }),
  }),
});

export type ExportDocument = z.infer<typeof exportDocumentSchema>;

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function buildExportDocument(summary: RunSummary, metadata: ExportMetadata): ExportDocument {
  return {
    timestamp: formatTimestamp(metadata.timestamp),
    project_root: metadata.rootPath,
    results: {
      simulation: summary.results
        .filter(r => r.category === 'simulation')
        .map((r): ExportedTest => ({ name: r.name, status: r.status === 'pass' ? 'PASS' : 'FAIL' })),
      synthesis: { count: summary.counts.synthesis },
      coverage: { count: summary.counts.coverage },
    },
  };
}

export async function exportResults(
  summary: RunSummary,
  metadata: ExportMetadata,
  destination: string
): Promise<ExportDocument> {
  const document = buildExportDocument(summary, metadata);
  try {
    await fs.writeFile(destination, JSON.stringify(document, null, 2) + '\n', 'utf-8');
  } catch (err) {
    throw new HTSError(HTSErrorCode.WRITE_FAILED, `Cannot write results to ${destination}`, {
      cause: describeError(err),
    });
  }
  return document;
}

export function parseExportDocument(raw: string): ExportDocument {
  return exportDocumentSchema.parse(JSON.parse(raw));
}
