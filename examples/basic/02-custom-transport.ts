/**
 * Example 2: Custom transport
 * Any async operation can be hedged; this one simulates a replica with a
 * long latency tail.
 */

import {
  LatencyTracker,
  HedgeDispatcher,
  PercentileLadderPolicy,
  createLogger,
  type AttemptContext,
  type HedgeTransport,
} from '../../src/index.js';

interface Lookup {
  table: string;
  id: number;
}

class FlakyReplicaTransport implements HedgeTransport<Lookup, string> {
  async send(request: Lookup, context: AttemptContext): Promise<string> {
    const latencyMs = Math.random() < 0.1 ? 1_000 : 20 + Math.random() * 30;

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => resolve(`${request.table}#${request.id} via attempt ${context.attempt}`), latencyMs);
      context.signal.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          reject(context.signal.reason);
        },
        { once: true }
      );
    });
  }
}

async function main(): Promise<void> {
  const tracker = new LatencyTracker({ windowSize: 200, minSamples: 20 });
  const dispatcher = new HedgeDispatcher<Lookup, string>({
    transport: new FlakyReplicaTransport(),
    policy: new PercentileLadderPolicy({
      targetSloMs: 200,
      hedgePoints: [0.5, 0.9],
      adaptive: { tracker, percentile: 0.9 },
    }),
    tracker,
    endpointKey: (request) => request.table,
    logger: createLogger({ level: 'debug', name: 'custom-transport' }),
  });

  for (let id = 0; id < 50; id++) {
    await dispatcher.dispatch({ table: 'users', id });
  }

  console.log(dispatcher.getStats());
  console.log(tracker.snapshot('users'));
  await dispatcher.close();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
