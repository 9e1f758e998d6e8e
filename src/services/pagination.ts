export interface Page<T> {
  items: T[];
  nextPageToken?: string;
}

export type PageFetcher<T> = (pageToken: string | undefined) => Promise<Page<T>>;

export interface CollectPagesOptions {
  /** Stop after this many pages even if the API offers more. Unbounded when omitted. */
  maxPages?: number;
}

/**
 * Walks a paginated listing starting from the first page, one request at a
 * time, until the API stops returning a `nextPageToken` or `maxPages` pages
 * have been read. Items keep the order the API returned them in. A failed
 * page rejects the whole walk; nothing gathered so far is returned.
 */
export async function collectPages<T>(
  fetchPage: PageFetcher<T>,
  options: CollectPagesOptions = {},
): Promise<Page<T>> {
  const { maxPages } = options;
  if (maxPages !== undefined && (!Number.isInteger(maxPages) || maxPages < 1)) {
    throw new RangeError(`maxPages must be a positive integer, received ${maxPages}`);
  }

  const items: T[] = [];
  let pageToken: string | undefined;
  let pagesFetched = 0;

  do {
    const page = await fetchPage(pageToken);
    pagesFetched++;
    items.push(...page.items);
    pageToken = page.nextPageToken || undefined;
  } while (pageToken && (maxPages === undefined || pagesFetched < maxPages));

  return pageToken ? { items, nextPageToken: pageToken } : { items };
}
