/**
 * Preview how a message would be routed.
 * Run with: npx tsx scripts/route-message.ts "Busca el clima hoy en Pamplona"
 * Without ANTHROPIC_API_KEY only the keyword heuristic is used.
 */
import 'dotenv/config';
import { loadConfig } from '../src/config/index.js';
import { createRoutingLayer } from '../src/bootstrap.js';

async function main(): Promise<void> {
  const message = process.argv.slice(2).join(' ').trim();
  if (!message) {
    console.error('Usage: tsx scripts/route-message.ts "<message>"');
    process.exitCode = 1;
    return;
  }

  const { router } = await createRoutingLayer(loadConfig());
  const decision = await router.route(message, []);
  console.log(JSON.stringify(decision, null, 2));
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
