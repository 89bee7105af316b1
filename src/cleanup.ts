/**
 * Expiry sweep
 *
 * Deletes expired authorization codes and access tokens. Run from cron or a
 * scheduler (`npm run cleanup`); safe to run while the gateway is serving.
 */

import { loadConfig } from "./lib/config.js";
import { SqliteCredentialStore } from "./lib/credential-store.js";
import { openDatabase } from "./lib/database.js";
import { safeLogError } from "./lib/errors.js";
import { sweepExpiredCredentials } from "./lib/token-storage.js";

async function main(): Promise<void> {
	const config = loadConfig();
	const db = openDatabase(config.databasePath);
	try {
		const removed = await sweepExpiredCredentials(new SqliteCredentialStore(db));
		console.log(`Removed ${removed.codes} expired authorization codes and ${removed.tokens} expired access tokens`);
	} finally {
		db.close();
	}
}

main().catch((error: unknown) => {
	safeLogError("Cleanup failed", error);
	process.exit(1);
});
