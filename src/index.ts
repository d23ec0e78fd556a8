/**
 * Vocab Reminder - Entry Point
 *
 * Usage:
 *   npm start
 *   PORT=8080 GATEWAY_URL=http://localhost:9000/send npm start
 */

import 'dotenv/config';
import { loadConfig, ConfigValidationError } from './config';
import { runServer } from './serve';

async function main(): Promise<void> {
  await runServer(loadConfig(process.env));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigValidationError) {
    console.error(`[Config] ${error.message}`);
    for (const invalid of error.invalidVars) {
      console.error(`  ${invalid.name}: ${invalid.reason}`);
    }
  } else {
    console.error('[Server] Failed to start:', error);
  }
  process.exit(1);
});
