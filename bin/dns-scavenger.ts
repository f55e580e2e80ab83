#!/usr/bin/env node
/**
 * dns-scavenger CLI entry point.
 *
 * Usage:
 *   dns-scavenger [--grid <host>] [--username <user>] [--cloud-days <n>] [--onprem-days <n>]
 *                 [--record-type <type...>] [--output-dir <dir>] [--insecure] [--no-dry-run]
 *
 * Anything not given as a flag is prompted for. The password comes from WAPI_PASSWORD or a
 * hidden prompt.
 */

import { main } from '../lib/cli/run';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
