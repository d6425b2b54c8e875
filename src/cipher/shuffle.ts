/**
 * Interleave permutation applied after substitution.
 *
 * shuffle(s) = reverse(s[0], s[2], ...) ++ reverse(s[1], s[3], ...)
 *
 * The split point of the output is ceil(n / 2), so unshuffle needs only
 * the sequence length to invert it.
 */
export function shuffle<T>(items: ArrayLike<T>): T[] {
  const evens: T[] = [];
  const odds: T[] = [];
  for (let i = 0; i < items.length; i += 1) {
    if (i % 2 === 0) {
      evens.push(items[i]);
    } else {
      odds.push(items[i]);
    }
  }
  return [...evens.reverse(), ...odds.reverse()];
}

/**
 * Inverse of shuffle
 */
export function unshuffle<T>(items: ArrayLike<T>): T[] {
  const n = items.length;
  const middle = Math.ceil(n / 2);
  const result = new Array<T>(n);

  // items[0..middle) holds the even positions reversed,
  // items[middle..n) the odd positions reversed
  for (let k = 0; k < middle; k += 1) {
    result[2 * k] = items[middle - 1 - k];
  }
  for (let k = 0; k < n - middle; k += 1) {
    result[2 * k + 1] = items[n - 1 - k];
  }
  return result;
}
