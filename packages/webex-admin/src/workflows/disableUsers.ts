import { writeFileSync } from 'fs';
import path from 'path';
import axios from 'axios';
import type { Logger } from 'pino';
import { ConfigurationError, RetriesExhaustedError } from '../api/errors';
import { promptProxyCredentials } from '../auth/prompt';
import { orgIdFromToken, promptToken } from '../auth/token';
import { createDirectoryClient, DirectoryClient } from '../directory/client';
import type { DirectoryRecord } from '../directory/record';
import { CsvRow, readCsv } from '../io/csv';
import { fileTimestamp } from './timeRanges';
import type { WorkflowContext } from './types';

export type DisableStatus = 'Success' | 'Failed' | 'Skipped' | 'NotFound' | 'DryRun';

export interface DisableOutcome {
  email: string;
  userId: string;
  displayName: string;
  status: DisableStatus;
}

export interface DisableUsersOptions {
  orgId?: string;
  dryRun?: boolean;
  logger?: Logger;
}

export interface DisableUsersArgs {
  file: string;
  column: string;
  report: boolean;
  dryRun: boolean;
}

export function emailsFromRows(rows: CsvRow[], column: string): string[] {
  const key = column.trim().toLowerCase();
  const seen = new Set<string>();
  const emails: string[] = [];
  for (const row of rows) {
    const email = row[key]?.trim();
    if (!email || seen.has(email.toLowerCase())) continue;
    seen.add(email.toLowerCase());
    emails.push(email);
  }
  return emails;
}

/**
 * One pass over the directory, keeping the accounts whose user name or any
 * email is in `emails`. Stops paging once every address has been matched.
 */
export async function indexUsersByEmail(
  client: DirectoryClient,
  emails: string[],
  orgId?: string,
): Promise<Map<string, DirectoryRecord>> {
  const wanted = new Set(emails.map(email => email.toLowerCase()));
  const found = new Map<string, DirectoryRecord>();
  if (wanted.size === 0) return found;

  for await (const user of client.listUsers(orgId)) {
    for (const address of [user.userName, ...user.emails.map(email => email.value)]) {
      const key = address.toLowerCase();
      if (wanted.has(key) && !found.has(key)) found.set(key, user);
    }
    if (found.size === wanted.size) break;
  }
  return found;
}

async function deactivate(
  client: DirectoryClient,
  user: DirectoryRecord,
  email: string,
  logger: Logger,
  orgId?: string,
): Promise<'Success' | 'Failed'> {
  try {
    const updated = await client.deactivateUser(user.id, orgId);
    if (updated && !updated.active) {
      logger.info({ email, userId: user.id }, 'Disabled user');
      return 'Success';
    }
    logger.warn({ email, userId: user.id, found: updated !== null }, 'User still active after update');
    return 'Failed';
  } catch (err) {
    if (axios.isAxiosError(err) || err instanceof RetriesExhaustedError) {
      logger.error({ err, email, userId: user.id }, 'Unable to disable user');
      return 'Failed';
    }
    throw err;
  }
}

/** Deactivates each listed account, reporting one outcome per email in input order. */
export async function disableUsers(
  client: DirectoryClient,
  emails: string[],
  options: DisableUsersOptions = {},
): Promise<DisableOutcome[]> {
  const logger = options.logger ?? client.session.logger;
  const users = await indexUsersByEmail(client, emails, options.orgId);
  const outcomes: DisableOutcome[] = [];
  const handled = new Set<string>();

  for (const email of emails) {
    const user = users.get(email.toLowerCase());
    if (!user) {
      logger.warn({ email }, 'User not found in directory');
      outcomes.push({ email, userId: '', displayName: '', status: 'NotFound' });
      continue;
    }

    const outcome = { email, userId: user.id, displayName: user.displayName };
    if (handled.has(user.id)) {
      logger.info({ email, userId: user.id }, 'User already handled under another address, skipping');
      outcomes.push({ ...outcome, status: 'Skipped' });
      continue;
    }
    handled.add(user.id);

    if (!user.active) {
      logger.info({ email }, 'User already inactive, skipping');
      outcomes.push({ ...outcome, status: 'Skipped' });
    } else if (options.dryRun) {
      logger.info({ email }, 'Dry run, user would be disabled');
      outcomes.push({ ...outcome, status: 'DryRun' });
    } else {
      outcomes.push({ ...outcome, status: await deactivate(client, user, email, logger, options.orgId) });
    }
  }

  return outcomes;
}

export function writeDisableReport(outcomes: DisableOutcome[], dir: string, now: Date): string {
  const filename = path.resolve(dir, `disabled_users_report.${fileTimestamp(now)}.json`);
  writeFileSync(filename, JSON.stringify(outcomes, null, 4));
  return filename;
}

export async function disableUsersMain(args: DisableUsersArgs, ctx: WorkflowContext): Promise<DisableOutcome[]> {
  const { config, logger } = ctx;

  const emails = emailsFromRows(readCsv(args.file, [args.column]), args.column);
  if (emails.length === 0) {
    throw new ConfigurationError(`No emails found in column "${args.column}" of ${args.file}`);
  }

  const token = config.token ?? await promptToken(process.env, ctx.askSecret);
  const orgId = orgIdFromToken(token);

  const client = createDirectoryClient({
    token,
    orgId,
    baseUrl: config.identityUrl,
    maxRetries: config.maxRetries,
    timeoutMs: config.timeoutMs,
    logger,
    sleep: ctx.sleep,
    proxyCredentials: () => promptProxyCredentials(ctx.ask, ctx.askSecret),
    transport: ctx.transport,
  });

  logger.info({ count: emails.length, dryRun: args.dryRun }, 'Disabling users');
  const outcomes = await disableUsers(client, emails, { dryRun: args.dryRun, logger });

  for (const outcome of outcomes) {
    logger.info(outcome, `[${outcome.status}] ${outcome.email}`);
  }

  if (args.report) {
    const filename = writeDisableReport(outcomes, process.cwd(), ctx.now?.() ?? new Date());
    logger.info({ filename }, 'Report written');
  }

  return outcomes;
}
