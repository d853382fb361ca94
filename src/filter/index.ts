export { SimpleBloomFilter } from './simple-filter'
