export { XxHash64Builder, hashIndices, hashValue, hashWith, sameHashers } from './hasher'
export type { BuildHasher, Hashable, HashValue, Hasher } from './hasher'
export { xxHash64 } from './xxhash64'
