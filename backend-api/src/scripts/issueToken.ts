import 'dotenv/config';

import { signAccessTokenWithTtl } from '../auth/jwt.js';
import { loadConfig, requireJwtSecret } from '../config.js';
import { parseArgs } from './cliArgs.js';

// Prints an access token for operators; there is no login endpoint in this service.
async function main() {
  requireJwtSecret(loadConfig());
  const { flags } = parseArgs(process.argv.slice(2));
  const username = String(flags.username ?? '').trim().toLowerCase();
  const role = String(flags.role ?? 'admin').trim() || 'admin';
  const ttlHours = Number(flags['ttl-hours'] ?? 12);
  if (!username) {
    console.error('Usage: npm run token:issue -w backend-api -- --username <name> [--role admin|user] [--ttl-hours 12]');
    process.exitCode = 2;
    return;
  }
  const token = await signAccessTokenWithTtl({ id: flags.id ?? username, username, role }, ttlHours);
  console.log(token);
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
