import type { Logger } from 'pino';
import { isObject, JsonObject } from '../api/json';
import type { PageIterator } from '../api/pageIterator';
import type { Session } from '../api/session';
import { DirectoryRecord } from './record';

interface OffsetCursor {
  startIndex: number;
  pageSize: number;
  totalResults: number | null;
}

function toInt(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value);
  return null;
}


/**
 * Walks a SCIM collection by `startIndex`, yielding one record at a time.
 *
 * `totalResults` is read from the first page only. Iteration ends when
 * `startIndex - 1 >= totalResults`, when a page carries no resources, when
 * the server-reported cursor stops advancing, or after `maxPages` requests.
 */
export class UserIterator implements AsyncIterableIterator<DirectoryRecord> {
  private readonly cursor: OffsetCursor = { startIndex: 1, pageSize: 0, totalResults: null };
  private readonly buffer: DirectoryRecord[] = [];
  private pages: PageIterator | null = null;
  private requests = 0;
  private finished = false;

  constructor(
    private readonly session: Session,
    private readonly path: string,
    private readonly logger: Logger,
    private readonly maxPages: number = session.maxPages,
  ) {}

  async next(): Promise<IteratorResult<DirectoryRecord, undefined>> {
    while (this.buffer.length === 0) {
      if (this.finished) return { done: true, value: undefined };
      await this.fetch();
    }
    const record = this.buffer.shift();
    return record ? { done: false, value: record } : { done: true, value: undefined };
  }

  async return(): Promise<IteratorResult<DirectoryRecord, undefined>> {
    this.buffer.length = 0;
    await this.finish();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  private async fetch(): Promise<void> {
    try {
      if (!this.pages) {
        if (this.requests >= this.maxPages) {
          this.logger.warn({ path: this.path, maxPages: this.maxPages }, 'Page limit reached, stopping user listing');
          await this.finish();
          return;
        }
        const params = this.cursor.pageSize > 0
          ? { startIndex: this.cursor.startIndex, count: this.cursor.pageSize }
          : { startIndex: this.cursor.startIndex };
        this.pages = this.session.get(this.path, { params });
        this.requests++;
      }

      const result = await this.pages.next();
      if (result.done) {
        this.pages = null;
        if (this.exhausted()) await this.finish();
        return;
      }
      this.consume(isObject(result.value.data) ? result.value.data : {});
    } catch (err) {
      await this.finish();
      throw err;
    }
  }

  // Body shape: { totalResults, itemsPerPage, startIndex, Resources: [...] }
  private consume(page: JsonObject): void {
    if (this.cursor.totalResults === null) {
      this.cursor.totalResults = toInt(page.totalResults) ?? 0;
    }

    const resources = Array.isArray(page.Resources) ? page.Resources : [];
    if (resources.length === 0) {
      this.logger.debug({ startIndex: this.cursor.startIndex }, 'Empty page, stopping user listing');
      this.finished = true;
      return;
    }

    const requestedIndex = this.cursor.startIndex;
    const itemsPerPage = toInt(page.itemsPerPage) || resources.length;
    const nextIndex = (toInt(page.startIndex) ?? requestedIndex) + itemsPerPage;

    this.buffer.push(...resources.map(resource => DirectoryRecord.fromResource(resource)));
    this.cursor.pageSize = itemsPerPage;

    if (nextIndex <= requestedIndex) {
      this.logger.warn({ requestedIndex, nextIndex }, 'startIndex did not advance, stopping user listing');
      this.finished = true;
      return;
    }
    this.cursor.startIndex = nextIndex;
  }

  private exhausted(): boolean {
    return this.cursor.startIndex - 1 >= (this.cursor.totalResults ?? 0);
  }

  private async finish(): Promise<void> {
    this.finished = true;
    if (this.pages) {
      const pages = this.pages;
      this.pages = null;
      await pages.return();
    }
  }
}
