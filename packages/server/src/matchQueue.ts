// packages/server/src/matchQueue.ts

const matchQueues = new Map<string, Promise<void>>();

function noop() {
  return undefined;
}

// Commands for one match run strictly one after another
export function enqueueMatchCommand<T>(
  matchKey: string,
  task: () => Promise<T> | T
): Promise<T> {
  const previous = matchQueues.get(matchKey) ?? Promise.resolve();

  const run = previous.then(() => task());

  // The queue tail never rejects; the caller gets the failure through `run`
  const tail: Promise<void> = run.then(noop, noop).then(() => {
    if (matchQueues.get(matchKey) === tail) {
      matchQueues.delete(matchKey);
    }
  });
  matchQueues.set(matchKey, tail);

  return run;
}

export function matchQueueKey(matchId: string): string {
  return `match:${matchId}`;
}

export function pendingQueueCount(): number {
  return matchQueues.size;
}

export const MATCH_CREATE_KEY = "match:create";
