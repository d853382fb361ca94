export type {
  BinaryBloomSet,
  BloomSet,
  BloomSetFactory,
  DeletableBloomSet,
  SetCapabilities,
  SpectralBloomSet,
} from './set'
export { getSetCapabilities, isBinary, isDeletable, isSpectral } from './set'
export type { BinaryBloomFilter, BloomFilter, DeletableBloomFilter, SpectralBloomFilter } from './filter'
