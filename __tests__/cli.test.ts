import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { main } from '../lib/cli/run';
import { formatProgress } from '../lib/cli/progress';
import type { Prompter } from '../lib/cli/prompts';
import { InterruptedError } from '../lib/errors';
import { jsonResponse, mockFetch } from './helpers/fakeWapi';

const env = { WAPI_PASSWORD: 'test-secret' };

function scriptedPrompter(answers: string[]): Prompter & { asked: string[] } {
  const asked: string[] = [];
  const next = async (q: string) => {
    asked.push(q);
    const answer = answers.shift();
    if (answer === undefined) throw new InterruptedError();
    return answer;
  };
  return { asked, ask: next, askHidden: next, close: jest.fn() };
}

describe('formatProgress', () => {
  test('renders the analysis breakdown', () => {
    expect(formatProgress({ type: 'classified', cloudCandidates: 2, onPremCandidates: 5, safe: 93 })).toEqual([
      '',
      '[+] Analysis Results:',
      '    - Cloud Candidates Identified: 2',
      '    - On-Prem Candidates Identified: 5',
      '    - Total Records Safe: 93',
    ]);
  });
});

describe('main', () => {
  let dir: string;
  let lines: string[];
  const print = (line: string) => lines.push(line);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scavenger-cli-'));
    lines = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('runs a full audit from flags and writes reports', async () => {
    const fetch = mockFetch().mockResolvedValueOnce(
      jsonResponse({
        result: [
          { name: 'stale.example.com', ipv4addr: '10.0.0.1' },
          { name: 'live.example.com', ipv4addr: '10.0.0.2', last_queried: Math.floor(Date.now() / 1000) },
        ],
      }),
    );

    const code = await main(
      ['--grid', 'grid.test', '--username', 'admin', '--cloud-days', '7', '--onprem-days', '90', '--output-dir', dir],
      { print, fetch, env },
    );

    expect(code).toBe(0);
    expect(lines).toContain('[*] Fetching record:a records...');
    expect(lines).toContain('[+] Total record:a records retrieved: 2');
    expect(lines).toContain('    - On-Prem Candidates Identified: 1');
    expect(lines).toContain('    - Total Records Safe: 1');
    expect(lines).toContain('[!] Dry Run Complete.');

    const files = await readdir(dir);
    expect(files).toContain('live_scavenging_summary.json');
    expect(files.filter((f) => f.startsWith('scavenging_manifest_'))).toHaveLength(1);
    expect(files.filter((f) => f.startsWith('affected_records_review_'))).toHaveLength(1);
    const summary: unknown = JSON.parse(await readFile(join(dir, 'live_scavenging_summary.json'), 'utf-8'));
    expect(summary).toMatchObject({ total_records: 2, total_candidates: 1, health_percentage: 50 });
  });

  test('prompts for missing settings and falls back to default thresholds on bad input', async () => {
    const prompter = scriptedPrompter(['grid.test', 'admin', 'lots', '90']);
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse({ result: [] }));

    const code = await main(['--output-dir', dir], { print, fetch, env, prompter });

    expect(code).toBe(0);
    expect(prompter.asked).toEqual([
      'Grid Master IP/FQDN: ',
      'Admin Username: ',
      'AWS/Cloud Records Threshold (e.g. 7): ',
      'On-Prem/Static Records Threshold (e.g. 90): ',
    ]);
    expect(lines).toContain('Invalid input. Defaulting to Cloud: 14, On-Prem: 30.');
    expect(lines).toContain('    - Cloud Threshold: 14 days');
    expect(await readdir(dir)).toEqual([]);
  });

  test('asks for the password when WAPI_PASSWORD is unset', async () => {
    const prompter = scriptedPrompter(['test-secret']);
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse({ result: [] }));

    const code = await main(
      ['--grid', 'grid.test', '--username', 'admin', '--cloud-days', '7', '--onprem-days', '30'],
      { print, fetch, env: {}, prompter },
    );

    expect(code).toBe(0);
    expect(prompter.asked).toEqual(['Admin Password: ']);
    expect(fetch.mock.calls[0][1].headers.Authorization).toBe('Basic YWRtaW46dGVzdC1zZWNyZXQ=');
  });

  test('transport failures print an error and exit non-zero without reports', async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse({ Error: 'denied' }, 401));

    const code = await main(
      ['--grid', 'grid.test', '--username', 'admin', '--cloud-days', '7', '--onprem-days', '30', '--output-dir', dir],
      { print, fetch, env },
    );

    expect(code).toBe(1);
    expect(lines[lines.length - 1]).toMatch(/^\[ERROR\] GET https:\/\/grid\.test\/wapi\/v2\.13\.1\/record:a\?.* failed: HTTP 401 Unauthorized$/);
    expect(await readdir(dir)).toEqual([]);
  });

  test('Ctrl-C while the last page is being read exits with 130 and writes nothing', async () => {
    const body = { result: [{ name: 'stale.example.com', ipv4addr: '10.0.0.1' }] };
    const fetch = mockFetch().mockResolvedValueOnce({
      ...jsonResponse(body),
      json: async () => {
        process.emit('SIGINT');
        return body;
      },
    });

    const code = await main(
      ['--grid', 'grid.test', '--username', 'admin', '--cloud-days', '7', '--onprem-days', '30', '--output-dir', dir],
      { print, fetch, env },
    );

    expect(code).toBe(130);
    expect(lines).not.toContain('[!] Dry Run Complete.');
    expect(lines[lines.length - 1]).toBe('[!] Operation cancelled by user.');
    expect(await readdir(dir)).toEqual([]);
  });

  test('an interrupted prompt exits with 130', async () => {
    const code = await main([], { print, env, prompter: scriptedPrompter([]) });

    expect(code).toBe(130);
    expect(lines[lines.length - 1]).toBe('[!] Operation cancelled by user.');
  });

  test('an empty grid address is a configuration error', async () => {
    const code = await main(['--username', 'admin'], { print, env, prompter: scriptedPrompter(['']) });

    expect(code).toBe(1);
    expect(lines[lines.length - 1]).toBe('[ERROR] Grid address is required');
  });
});
