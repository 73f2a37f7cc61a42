/**
 * Read the next page number from a GitHub `Link` header.
 *
 * @param link - Raw `Link` header value.
 * @returns Next page number, or 0 when there is no next page.
 */
export function parseNextPage(link: undefined | string): number {
  if (!link) {
    return 0
  }

  for (let part of link.split(',')) {
    let match = part.match(/<(?<url>[^>]+)>\s*;\s*rel="next"/u)
    let target = match?.groups?.['url']
    if (!target) {
      continue
    }
    let page = Number.parseInt(new URL(target).searchParams.get('page') ?? '', 10)
    return Number.isNaN(page) ? 0 : page
  }

  return 0
}
