import type { AuthStepName } from '@root/types/trakt.types.js'
import { load } from 'cheerio'
import { ScrapeError } from './errors.js'

export interface ScrapeTarget {
  /** Auth step the page belongs to; named in the error when the node is missing */
  step: AuthStepName
  selector: string
  attribute: string
}

/**
 * Extracts an attribute from the first node matching a CSS selector.
 *
 * @throws {ScrapeError} when no node matches or the attribute is absent or empty
 */
export function scrapeAttribute(html: string, target: ScrapeTarget): string {
  const $ = load(html)
  const node = $(target.selector).first()
  if (node.length === 0) {
    throw new ScrapeError(target.step, target.selector, target.attribute)
  }

  const value = node.attr(target.attribute)
  if (!value) {
    throw new ScrapeError(
      target.step,
      target.selector,
      target.attribute,
      'attribute missing on matched node',
    )
  }
  return value
}
