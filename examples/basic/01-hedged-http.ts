/**
 * Example 1: Hedged HTTP
 * Hedge GET requests against a slow upstream, learning the SLO per endpoint.
 *
 * Usage:
 *   tsx examples/basic/01-hedged-http.ts https://example.com/
 */

import { HedgedHttpClient, httpEndpointKey } from '../../src/index.js';

async function main(): Promise<void> {
  const url = process.argv[2] ?? 'https://example.com/';

  const client = new HedgedHttpClient({
    config: {
      targetSloMs: 800,
      hedgeFraction: 0.9,
      maxHedges: 2,
      adaptive: true,
      percentile: 0.95,
      logLevel: 'info',
    },
  });

  client.dispatcher.on('hedgeFired', (event) => {
    console.log(`hedge #${event.attempt} fired after ${event.elapsedMs} ms`);
  });

  for (let i = 0; i < 20; i++) {
    const response = await client.get(url);
    await response.arrayBuffer();
    console.log(`request ${i + 1}: HTTP ${response.status}`);
  }

  const stats = client.getStats();
  console.log(`\nhedges fired: ${stats.hedgesFired}, hedge wins: ${stats.hedgeWins}`);
  console.log(client.dispatcher.tracker?.snapshot(httpEndpointKey({ method: 'GET', url })));

  await client.close();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
