import type { AxiosResponse } from 'axios';
import { headerValue, nextLink } from './headers';
import type { Session } from './session';
import type { HttpMethod, LinkCursor, RequestOptions } from './types';

/**
 * One logical request as a pull-driven sequence of pages. Each call to
 * next() fetches at most one page; nothing is prefetched. The cursor is the
 * next-page URL from the previous response's `Link` header.
 *
 * Not restartable: once done (or after an error) it stays done.
 */
export class PageIterator<T = unknown> implements AsyncIterableIterator<AxiosResponse<T>> {
  private readonly cursor: LinkCursor;

  constructor(
    private readonly session: Session,
    private readonly method: HttpMethod,
    url: string,
    private readonly options: RequestOptions,
  ) {
    this.cursor = { nextUrl: url, pagesFetched: 0, visited: new Set() };
  }

  get pagesFetched(): number {
    return this.cursor.pagesFetched;
  }

  get done(): boolean {
    return this.cursor.nextUrl === null;
  }

  async next(): Promise<IteratorResult<AxiosResponse<T>, undefined>> {
    const url = this.cursor.nextUrl;
    if (url === null) return { done: true, value: undefined };

    if (this.cursor.pagesFetched >= this.session.maxPages) {
      this.session.logger.warn({ url, maxPages: this.session.maxPages }, 'Page limit reached, stopping pagination');
      this.finish();
      return { done: true, value: undefined };
    }

    // Follow-up pages carry their own query string in the link.
    const options = this.cursor.pagesFetched === 0 ? this.options : { ...this.options, params: undefined };

    let response: AxiosResponse<T>;
    try {
      response = await this.session.execute<T>(this.method, url, options);
    } catch (err) {
      this.finish();
      throw err;
    }

    this.cursor.pagesFetched++;
    this.cursor.visited.add(this.session.normalizeUrl(url));

    const next = nextLink(headerValue(response.headers, 'link'));
    if (next !== null && this.cursor.visited.has(this.session.normalizeUrl(next))) {
      this.session.logger.warn({ url: next }, 'Next link points at an already fetched page, stopping pagination');
      this.cursor.nextUrl = null;
    } else {
      this.cursor.nextUrl = next;
    }

    return { done: false, value: response };
  }

  async return(): Promise<IteratorResult<AxiosResponse<T>, undefined>> {
    this.finish();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /** Drains the remaining pages into an array. */
  async collect(): Promise<AxiosResponse<T>[]> {
    const pages: AxiosResponse<T>[] = [];
    for await (const page of this) pages.push(page);
    return pages;
  }

  private finish(): void {
    this.cursor.nextUrl = null;
  }
}
