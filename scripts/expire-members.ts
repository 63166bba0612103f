/**
 * Expire Members (standalone cron job)
 * Runs one expiration sweep and exits
 *
 * Usage: npm run sweep
 */

import 'dotenv/config';

import { createSupabaseAdmin, loadConfig } from '../src/lib/index.js';
import {
  createLifecycleService,
  createMemberServiceDb,
  createNotifier,
  createPaymentVerifier,
} from '../src/services/index.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const supabase = createSupabaseAdmin(config);

  const lifecycleService = createLifecycleService({
    db: createMemberServiceDb(supabase),
    payments: createPaymentVerifier(supabase),
    notifier: createNotifier(supabase),
  });

  const result = await lifecycleService.deactivateExpiredMembers();

  if (!result.success) {
    console.error(`[Expire Members] ${result.error.message}`);
    console.error(JSON.stringify(result.error.details, null, 2));
    return 1;
  }

  console.error(
    `[Expire Members] Evaluated ${result.data.evaluated}, deactivated ${result.data.deactivated.length}`
  );
  return 0;
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('[Expire Members] Unhandled error:', error);
    process.exit(1);
  });
