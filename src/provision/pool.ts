/**
 * Runs `worker` over `items` with at most `concurrency` in flight and returns results in input order.
 * Items sharing a lane key run one after another in input order; with a concurrency of 1 every item
 * runs sequentially in input order.
 */
export async function mapInLanes<T, R>(
  items: readonly T[],
  concurrency: number,
  laneKey: (item: T) => string,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);

  if (concurrency <= 1) {
    for (const [index, item] of items.entries()) {
      results[index] = await worker(item, index);
    }
    return results;
  }

  const lanes = new Map<string, number[]>();
  for (const [index, item] of items.entries()) {
    const key = laneKey(item);
    const lane = lanes.get(key);
    if (lane) {
      lane.push(index);
    } else {
      lanes.set(key, [index]);
    }
  }

  const queue = [...lanes.values()];
  let next = 0;

  const runLanes = async (): Promise<void> => {
    while (next < queue.length) {
      const lane = queue[next];
      next += 1;
      for (const index of lane) {
        results[index] = await worker(items[index], index);
      }
    }
  };

  const workerCount = Math.min(concurrency, queue.length);
  await Promise.all(Array.from({ length: workerCount }, () => runLanes()));
  return results;
}
