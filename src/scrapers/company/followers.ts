import { COMMON_SELECTORS } from '../../config/constants'
import { COMPANY_SELECTORS } from '../../config/selectors'
import { collectPaginated } from '../../extraction/collector'
import { FollowerParser } from '../../extraction/parsers/people-parser'
import type { CompanyAggregate } from '../../models/company'
import { log } from '../../utils/logger'
import { stripUrl } from '../../utils/url'
import { ShowMoreListSource, profileUrlOf } from '../list-source'
import type { ScrapeContext } from '../options'
import { navigateAndWait, parseEntry } from '../utils'

/**
 * Followers in the viewer's network, listed in an overlay that grows with
 * "Show more results".
 */
export async function scrapeFollowers(
  context: ScrapeContext,
  company: CompanyAggregate,
  maxPages: number,
): Promise<void> {
  const { page } = context
  await navigateAndWait(
    page,
    `${stripUrl(company.linkedinUrl)}/?showInNetworkFollowers=true`,
    context.callback,
  )

  const modal = page.locator(COMMON_SELECTORS.MODAL).first()
  const opened = await modal
    .waitFor({ state: 'visible', timeout: context.waitTimeoutMs })
    .then(() => true)
    .catch(() => false)
  if (!opened) {
    log.skip('Followers overlay did not open')
    return
  }

  const parser = new FollowerParser()
  const result = await collectPaginated(
    new ShowMoreListSource(modal, COMPANY_SELECTORS.FOLLOWER_ITEM),
    {
      section: 'followers',
      maxPages,
      waitTimeoutMs: context.waitTimeoutMs,
      urlOf: profileUrlOf,
      extract: async (entry) => {
        const follower = await parseEntry(entry, parser)
        return follower && company.addFollower(follower) ? follower : null
      },
    },
  )

  for (const [key, message] of Object.entries(result.errors)) {
    company.recordError(key, message)
  }
  log.success(
    `Parsed ${result.items.length} followers over ` +
      `${result.pagesVisited} batches (${result.state})`,
  )
}
