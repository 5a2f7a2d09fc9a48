export async function mapWithConcurrency<TItem, TResult>(params: {
  items: readonly TItem[];
  concurrency: number;
  fn: (item: TItem, index: number) => Promise<TResult>;
}): Promise<TResult[]> {
  const max = Math.max(1, Math.floor(params.concurrency || 1));
  const out = new Array<TResult>(params.items.length);

  // Workers pull from one shared iterator, so each index is handed out once.
  const entries = params.items.entries();
  const workers = Array.from({ length: Math.min(max, params.items.length) }, async () => {
    for (const [idx, item] of entries) {
      out[idx] = await params.fn(item, idx);
    }
  });

  await Promise.all(workers);
  return out;
}

/**
 * Serializes async work per key. Work under different keys runs concurrently.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((r) => {
      release = r;
    });
    this.tails.set(key, current);
    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === current) this.tails.delete(key);
    }
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
