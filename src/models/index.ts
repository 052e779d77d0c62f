export * from './common'
export * from './company'
export * from './person'
export { AppendOnlyList } from './aggregate'
