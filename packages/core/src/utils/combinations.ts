/**
 * All k-element combinations of `items`, in lexicographic index order.
 */
export function combinations<T>(items: readonly T[], k: number): T[][] {
  const n = items.length;
  if (k <= 0 || k > n) {
    return [];
  }

  const result: T[][] = [];
  const indices = Array.from({ length: k }, (_, i) => i);

  for (;;) {
    result.push(indices.map(i => items[i]));

    // Rightmost index that can still move right
    let i = k - 1;
    while (i >= 0 && indices[i] === n - k + i) {
      i--;
    }
    if (i < 0) {
      return result;
    }

    indices[i]++;
    for (let j = i + 1; j < k; j++) {
      indices[j] = indices[j - 1] + 1;
    }
  }
}
