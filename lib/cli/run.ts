import { Command, CommanderError } from 'commander';
import { runAudit } from '../audit';
import { resolveThresholds } from '../classifier';
import { CONFIG } from '../config';
import { ConfigurationError, InterruptedError, errorMessage } from '../errors';
import logger from '../logger';
import { register } from '../metrics';
import type { HttpFetch } from '../net/httpTransport';
import { atomicWriteFile } from '../report/atomicWrite';
import { writeReports } from '../report/emitter';
import { withScavengerSession } from '../wapi/session';
import { createConsoleProgress } from './progress';
import { createPrompter, type Prompter } from './prompts';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type CliOptions = {
  grid?: string;
  username?: string;
  cloudDays?: string;
  onpremDays?: string;
  recordType: string[];
  outputDir: string;
  wapiVersion: string;
  insecure: boolean;
  dryRun: boolean;
  metricsFile?: string;
};

export interface CliDeps {
  print?: (line: string) => void;
  prompter?: Prompter;
  fetch?: HttpFetch;
  env?: NodeJS.ProcessEnv;
}

export function buildProgram(): Command {
  return new Command()
    .name('dns-scavenger')
    .description('Audit grid DNS address records and report stale scavenging candidates (read-only)')
    .option('--grid <host>', 'grid master IP or FQDN')
    .option('--username <user>', 'admin username (password is read from WAPI_PASSWORD or prompted)')
    .option('--cloud-days <days>', 'staleness threshold for cloud records')
    .option('--onprem-days <days>', 'staleness threshold for on-prem records')
    .option('--record-type <type...>', 'WAPI record types to audit', [CONFIG.DEFAULT_RECORD_TYPE])
    .option('--output-dir <dir>', 'directory for report files', CONFIG.OUTPUT_DIR)
    .option('--wapi-version <version>', 'WAPI version', CONFIG.WAPI.VERSION)
    .option('--insecure', 'skip TLS certificate verification', CONFIG.WAPI.TLS_INSECURE)
    .option('--no-dry-run', 'compute statistics only, write no report files')
    .option('--metrics-file <path>', 'write Prometheus metrics to this file after the run')
    .exitOverride();
}

function requireValue(value: string, what: string): string {
  if (!value) throw new ConfigurationError(`${what} is required`);
  return value;
}

/**
 * Parse arguments, collect missing settings interactively, run the audit and print results.
 * Resolves to the process exit code; never rejects.
 */
export async function main(args: string[], deps: CliDeps = {}): Promise<ExitCode> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const env = deps.env ?? process.env;

  let opts: CliOptions;
  try {
    opts = buildProgram().parse(args, { from: 'user' }).opts<CliOptions>();
  } catch (err) {
    // commander has already printed usage or the parse error
    logger.debug({ err }, 'argument parsing stopped');
    return err instanceof CommanderError && err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR;
  }

  const controller = new AbortController();
  const interrupt = () => controller.abort();
  process.once('SIGINT', interrupt);

  let prompter = deps.prompter ?? null;
  const ownsPrompter = !deps.prompter;
  const prompt = (): Prompter => {
    if (!prompter) prompter = createPrompter(controller.signal, interrupt);
    return prompter;
  };

  try {
    print('=== Hybrid DNS Scavenger CLI ===');
    const gridHost = requireValue(opts.grid ?? (await prompt().ask('Grid Master IP/FQDN: ')), 'Grid address');
    const username = requireValue(opts.username ?? (await prompt().ask('Admin Username: ')), 'Username');
    const password = requireValue(env.WAPI_PASSWORD ?? (await prompt().askHidden('Admin Password: ')), 'Password');

    let cloudInput = opts.cloudDays;
    let onPremInput = opts.onpremDays;
    if (cloudInput === undefined || onPremInput === undefined) {
      print('');
      print('--- Scavenging Configuration (in Days) ---');
      if (cloudInput === undefined) cloudInput = await prompt().ask('AWS/Cloud Records Threshold (e.g. 7): ');
      if (onPremInput === undefined) onPremInput = await prompt().ask('On-Prem/Static Records Threshold (e.g. 90): ');
    }
    const { thresholds, error } = resolveThresholds(cloudInput, onPremInput);
    if (error) {
      print(`Invalid input. Defaulting to Cloud: ${thresholds.cloudDays}, On-Prem: ${thresholds.onPremDays}.`);
    }

    await withScavengerSession(
      {
        gridHost,
        username,
        password,
        wapiVersion: opts.wapiVersion,
        verifyTls: !opts.insecure,
        signal: controller.signal,
        fetch: deps.fetch,
      },
      ({ fetcher }) =>
        runAudit(fetcher, {
          thresholds,
          recordTypes: opts.recordType,
          dryRun: opts.dryRun,
          onProgress: createConsoleProgress(print),
          signal: controller.signal,
          writeReports: (result, now) =>
            writeReports(result, { outputDir: opts.outputDir, now, signal: controller.signal }),
        }),
    );

    if (opts.metricsFile) {
      await atomicWriteFile(opts.metricsFile, await register.metrics());
      print(`    - Metrics: ${opts.metricsFile}`);
    }
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    if (err instanceof InterruptedError || controller.signal.aborted) {
      print('');
      print('[!] Operation cancelled by user.');
      return EXIT_CODES.INTERRUPTED;
    }
    logger.debug({ err }, 'audit run failed');
    print('');
    print(`[ERROR] ${errorMessage(err)}`);
    return EXIT_CODES.ERROR;
  } finally {
    process.removeListener('SIGINT', interrupt);
    if (prompter && ownsPrompter) prompter.close();
  }
}
