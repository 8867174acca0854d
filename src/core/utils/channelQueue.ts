import { TaskLimiter } from './concurrency';

const queues = new Map<string, TaskLimiter>();

/**
 * Run `task` after every task already submitted for the same channel has settled.
 * Other channels are not blocked.
 *
 * A channel's queue is dropped as soon as it has nothing running or waiting, so the
 * map only holds channels with work in flight.
 */
export function runInChannel<T>(channelId: string, task: () => Promise<T>): Promise<T> {
  let queue = queues.get(channelId);
  if (!queue) {
    queue = new TaskLimiter(1, () => queues.delete(channelId));
    queues.set(channelId, queue);
  }
  return queue.run(task);
}

/** Number of channels with a reply running or waiting. */
export function busyChannelCount(): number {
  return queues.size;
}
