/**
 * Generic NextToken paginator.
 *
 * Not every SSM Describe* call has a generated paginator, so listings go
 * through this helper instead.
 */

export interface TokenPage<T> {
  items: T[];
  nextToken?: string;
}

/**
 * Collect every item of a NextToken-paginated listing.
 *
 * @param fetchPage - Fetches one page given the token of the previous response
 * @returns All items, in page order
 */
export async function collectPages<T>(
  fetchPage: (nextToken: string | undefined) => Promise<TokenPage<T>>
): Promise<T[]> {
  const items: T[] = [];
  let nextToken: string | undefined;

  do {
    const page = await fetchPage(nextToken);
    items.push(...page.items);
    nextToken = page.nextToken;
  } while (nextToken);

  return items;
}
