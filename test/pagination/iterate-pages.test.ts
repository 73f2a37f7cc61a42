import { describe, expect, it, vi } from 'vitest'

import type { Page } from '../../types/page'

import { iteratePages } from '../../core/pagination/iterate-pages'
import { collectPages } from '../../core/pagination/collect-pages'
import { findInPages } from '../../core/pagination/find-in-pages'

/**
 * Serve fixed pages, each pointing at the following one.
 *
 * @param pages - Items of each page.
 * @returns Page fetcher.
 */
function pagesOf<T>(pages: T[][]): (page: number) => Promise<Page<T>> {
  return vi.fn((page: number) =>
    Promise.resolve({
      nextPage: page < pages.length ? page + 1 : 0,
      items: pages[page - 1] ?? [],
    }),
  )
}

describe('iteratePages', () => {
  it('yields items of every page in order', async () => {
    let items: string[] = []
    for await (let item of iteratePages(pagesOf([['a', 'b'], ['c']]))) {
      items.push(item)
    }
    expect(items).toEqual(['a', 'b', 'c'])
  })

  it('requests exactly the page reported as next', async () => {
    let fetchPage = vi.fn((page: number) =>
      Promise.resolve({ nextPage: page === 1 ? 4 : 0, items: [page] }),
    )
    expect(await collectPages(fetchPage)).toEqual([1, 4])
    expect(fetchPage.mock.calls).toEqual([[1], [4]])
  })

  it('handles an empty last page', async () => {
    let fetchPage = pagesOf([['a'], []])
    expect(await collectPages(fetchPage)).toEqual(['a'])
    expect(fetchPage).toHaveBeenCalledTimes(2)
  })

  it('propagates page errors', async () => {
    let fetchPage = vi.fn((page: number) =>
      page === 1
        ? Promise.resolve({ items: ['a'], nextPage: 2 })
        : Promise.reject(new Error('boom')),
    )
    await expect(collectPages(fetchPage)).rejects.toThrow('boom')
  })
})

describe('findInPages', () => {
  it('returns the first match and stops fetching', async () => {
    let fetchPage = pagesOf([['a'], ['b', 'a'], ['c']])
    let found = await findInPages(fetchPage, item => item === 'b')
    expect(found).toBe('b')
    expect(fetchPage).toHaveBeenCalledTimes(2)
  })

  it('returns null when nothing matches', async () => {
    let fetchPage = pagesOf([['a'], ['b']])
    expect(await findInPages(fetchPage, item => item === 'z')).toBeNull()
    expect(fetchPage).toHaveBeenCalledTimes(2)
  })
})
