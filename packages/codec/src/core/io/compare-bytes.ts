/**
 * Lexicographic comparison of two byte strings: negative when `a` sorts
 * first, zero when equal, positive otherwise. A proper prefix sorts first.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length)

  for (let i = 0; i < n; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0) return diff
  }

  return a.length - b.length
}
