export { scrapeCompany } from './company'
export type { CompanyScraperOptions } from './company'
export { scrapePerson } from './person'
export type { PersonScraperOptions } from './person'
export {
  CompanyScraperOptionsSchema,
  PersonScraperOptionsSchema,
} from './options'
export type { ScrapeContext } from './options'
export { NextButtonListSource, ShowMoreListSource } from './list-source'
