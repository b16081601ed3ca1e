import { Client } from 'pg';
import { ENV } from './env';
import { debug, errorMessage, warn } from './log';
import type { JobDiagnostics, UsageReport } from './types';

export type RunStatus = 'started' | 'completed' | 'partial' | 'failed';

/**
 * Run `fn` with a connected client. Resolves to undefined without connecting when the
 * ledger is disabled (DISABLE_DB=true).
 */
export async function withPg<T>(fn: (c: Client) => Promise<T>): Promise<T | undefined> {
  if (ENV.disableDb) {
    debug('db.disabled', { reason: 'DISABLE_DB true' });
    return undefined;
  }
  const client = new Client({ connectionString: ENV.databaseUrl });
  try {
    await client.connect();
  } catch (e) {
    warn('db.connect.fail', { url: redactUrl(ENV.databaseUrl), error: errorMessage(e) });
    throw e;
  }
  try {
    return await fn(client);
  } finally {
    try { await client.end(); } catch (e) { debug('db.end.fail', { error: errorMessage(e) }); }
  }
}

export function redactUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ':***@');
}

export async function insertRun(
  client: Client,
  jobId: string,
  sourcePath: string,
  format: string,
  chunkSec: number
): Promise<string> {
  const res = await client.query<{ id: string }>(
    `INSERT INTO runs (job_id, source_path, format, chunk_sec, status)
     VALUES ($1,$2,$3,$4,'started') RETURNING id`,
    [jobId, sourcePath, format, chunkSec]
  );
  return res.rows[0].id;
}

export async function finishRun(
  client: Client,
  runId: string,
  status: RunStatus,
  report: { usage?: UsageReport; diagnostics?: JobDiagnostics; error?: string }
) {
  await client.query(
    `UPDATE runs SET status=$2, usage=$3, diagnostics=$4, error=$5, updated_at=now() WHERE id=$1`,
    [
      runId,
      status,
      report.usage ? JSON.stringify(report.usage) : null,
      report.diagnostics ? JSON.stringify(report.diagnostics) : null,
      report.error ?? null,
    ]
  );
}
