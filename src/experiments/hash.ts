/**
 * Domain hash used as the first field of every tracking cookie value.
 * Bytes are scanned from last to first, as the tracking client does.
 */
export function generateHash(input: string): number {
  if (input === "") {
    return 1;
  }

  const bytes = Buffer.from(input, "utf8");
  let hash = 0;

  for (let pos = bytes.length - 1; pos >= 0; pos--) {
    const current = bytes[pos];
    hash = ((hash << 6) & 0xfffffff) + current + (current << 14);
    const leftMost7 = hash & 0xfe00000;
    if (leftMost7 !== 0) {
      hash ^= leftMost7 >> 21;
    }
  }

  return hash;
}
