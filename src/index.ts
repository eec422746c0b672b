/**
 * Knockout Tracker - Entry point
 *
 * Reads tournament hand histories, rebuilds side pots and credits Hero's
 * knockouts. Serves the results over HTTP + WebSocket.
 */

import 'dotenv/config';
import { createApiServer, startServer } from './api/server.js';
import { loadConfig } from './config.js';
import { NoInputError } from './import/discovery.js';
import { KnockoutSession } from './import/session.js';
import { ResultsLedger } from './ledger/results-ledger.js';

const config = loadConfig();
const ledger = new ResultsLedger({ storePath: config.ledgerPath });
const session = new KnockoutSession(config, ledger);
const api = createApiServer({ config, session, ledger });

startServer(api, config);

if (config.importOnStart) {
  session.importPaths().catch((err: unknown) => {
    if (err instanceof NoInputError) {
      console.error(`FATAL: ${err.message}. Set HH_PATHS to a file or directory of hand histories.`);
      process.exit(1);
    }
    console.error('[session] Startup import failed:', err);
  });
}
