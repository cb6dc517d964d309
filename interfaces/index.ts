export { isExpiryReport } from './ExpiryReport'
export type { ExpiryReport } from './ExpiryReport'
