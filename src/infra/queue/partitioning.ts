/**
 * Murmur3 (32-bit) over the UTF-8 bytes of the key. Stable across processes
 * and restarts, which is what pins a conversation to one partition.
 */
export function murmurHash3(key: string): number {
  const data = Buffer.from(key, "utf8");
  const c1 = 0xcc9e2d51;
  const c2 = 0x1b873593;
  const r1 = 15;
  const r2 = 13;
  const m = 5;
  const n = 0xe6546b64;

  let hash = 0;
  const nblocks = Math.floor(data.length / 4);

  for (let i = 0; i < nblocks; i++) {
    let k = data.readInt32LE(i * 4);
    k = Math.imul(k, c1);
    k = (k << r1) | (k >>> (32 - r1));
    k = Math.imul(k, c2);

    hash ^= k;
    hash = (hash << r2) | (hash >>> (32 - r2));
    hash = (Math.imul(hash, m) + n) | 0;
  }

  let k = 0;
  const remaining = data.length % 4;
  if (remaining >= 3) k ^= data[nblocks * 4 + 2] << 16;
  if (remaining >= 2) k ^= data[nblocks * 4 + 1] << 8;
  if (remaining >= 1) {
    k ^= data[nblocks * 4];
    k = Math.imul(k, c1);
    k = (k << r1) | (k >>> (32 - r1));
    k = Math.imul(k, c2);
    hash ^= k;
  }

  hash ^= data.length;
  hash ^= hash >>> 16;
  hash = Math.imul(hash, 0x85ebca6b);
  hash ^= hash >>> 13;
  hash = Math.imul(hash, 0xc2b2ae35);
  hash ^= hash >>> 16;

  return hash >>> 0;
}

export function partitionFor(key: string, totalPartitions: number): number {
  return murmurHash3(key) % totalPartitions;
}
