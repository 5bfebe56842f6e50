import type { Logger } from 'pino';
import { ConfigurationError } from '../api/errors';
import { isObject, JsonObject } from '../api/json';
import { resourcePath } from '../api/resources';
import { createSession, Session } from '../api/session';
import type { QueryParams } from '../api/types';
import { promptProxyCredentials } from '../auth/prompt';
import { promptToken } from '../auth/token';
import { writeCsv } from '../io/csv';
import { generateTimeRanges, TimeRange } from './timeRanges';
import type { WorkflowContext } from './types';

export const MAX_PERIOD_DAYS = 365;
export const MAX_SPAN_DAYS = 90;

export interface RecordingSummary {
  recordingId: string;
  topic: string;
  timeRecorded: string;
}

export interface RecordingAccessRow {
  recordingId: string;
  topic: string;
  timeRecorded: string;
  requestorName: string;
  requestorEmail: string;
  accessTime: string;
  downloaded: boolean;
  viewed: boolean;
}

export interface RecordingReportArgs {
  period: number;
  span: number;
  write?: string;
}

const text = (value: unknown) => (typeof value === 'string' ? value : '');

// Every page of a Link-paginated `{ items: [...] }` listing.
async function listItems(session: Session, path: string, params: QueryParams): Promise<JsonObject[]> {
  const items: JsonObject[] = [];
  for await (const page of session.get(path, { params })) {
    const body = isObject(page.data) ? page.data : {};
    if (!Array.isArray(body.items)) continue;
    items.push(...body.items.filter(isObject));
  }
  return items;
}

export async function fetchAccessSummaries(session: Session, range: TimeRange): Promise<RecordingSummary[]> {
  const items = await listItems(session, resourcePath('recordingAccessSummary'), {
    hostEmail: 'all',
    from: range.from,
    to: range.to,
  });
  return items
    .filter(item => typeof item.recordingId === 'string' && item.recordingId !== '')
    .map(item => ({
      recordingId: text(item.recordingId),
      topic: text(item.topic),
      timeRecorded: text(item.timeRecorded),
    }));
}

export async function fetchAccessDetail(session: Session, recording: RecordingSummary): Promise<RecordingAccessRow[]> {
  const items = await listItems(session, resourcePath('recordingAccessDetail'), {
    recordingId: recording.recordingId,
  });
  return items.map(item => ({
    recordingId: recording.recordingId,
    topic: recording.topic,
    timeRecorded: recording.timeRecorded,
    requestorName: text(item.name),
    requestorEmail: text(item.email),
    accessTime: text(item.accessTime),
    downloaded: item.downloaded === true,
    viewed: item.viewed === true,
  }));
}

/** Access rows for every recording in every window, windows newest first. */
export async function buildRecordingReport(
  session: Session,
  ranges: TimeRange[],
  logger: Logger = session.logger,
): Promise<RecordingAccessRow[]> {
  const recordings: RecordingSummary[] = [];
  for (const range of ranges) {
    const summaries = await fetchAccessSummaries(session, range);
    logger.debug({ ...range, count: summaries.length }, 'Fetched recording access summary');
    recordings.push(...summaries);
  }

  const rows: RecordingAccessRow[] = [];
  for (const recording of recordings) {
    const detail = await fetchAccessDetail(session, recording);
    if (detail.length === 0) {
      logger.info({ recordingId: recording.recordingId }, 'No detailed report found for recording');
      continue;
    }
    rows.push(...detail);
  }
  return rows;
}

export function validateReportArgs(args: RecordingReportArgs): void {
  if (!Number.isInteger(args.period) || args.period < 1 || args.period > MAX_PERIOD_DAYS) {
    throw new ConfigurationError(`Period must be between 1 and ${MAX_PERIOD_DAYS} days, got ${args.period}`);
  }
  if (!Number.isInteger(args.span) || args.span < 1 || args.span > MAX_SPAN_DAYS) {
    throw new ConfigurationError(`Span must be between 1 and ${MAX_SPAN_DAYS} days, got ${args.span}`);
  }
}

export async function recordingReportMain(args: RecordingReportArgs, ctx: WorkflowContext): Promise<RecordingAccessRow[]> {
  const { config, logger } = ctx;
  validateReportArgs(args);

  const token = config.token ?? await promptToken(process.env, ctx.askSecret);
  const session = createSession({
    token,
    baseUrl: config.baseUrl,
    maxRetries: config.maxRetries,
    timeoutMs: config.timeoutMs,
    logger,
    sleep: ctx.sleep,
    proxyCredentials: () => promptProxyCredentials(ctx.ask, ctx.askSecret),
    transport: ctx.transport,
  });

  const ranges = generateTimeRanges(args.period, args.span, ctx.now?.() ?? new Date());
  const rows = await buildRecordingReport(session, ranges, logger);

  if (rows.length === 0) {
    logger.info({ period: args.period }, 'No recording report found');
    return rows;
  }

  if (args.write) {
    const filename = writeCsv(rows, args.write);
    logger.info({ filename, rows: rows.length }, 'Report written');
  }
  logger.debug({ rows }, 'Recording access report');

  return rows;
}
