/**
 * Tests for the file verification CLI helpers
 */

import { CliUsageError, formatResultsTable, main, parseArgs, parseEmailList } from '../src/cli/verifyFile';
import { VerificationResult, Verdict } from '../src/types/email';

function result(input: string, verdict: Verdict, reason: string): VerificationResult {
  const at = new Date(0);
  return {
    input,
    verdict,
    reason,
    syntax: { address: input, localPart: '', domain: '', isValidSyntax: true },
    mx: null,
    misc: null,
    smtp: null,
    debug: { startedAt: at, finishedAt: at, durationMs: 0, methods: [] },
  };
}

describe('parseArgs', () => {
  it('should read the file and options', () => {
    expect(parseArgs(['emails.txt', '--out', 'results.json', '--concurrency', '10'])).toEqual({
      inputFile: 'emails.txt',
      outputFile: 'results.json',
      concurrency: 10,
      showHelp: false,
    });
  });

  it('should default concurrency and show help without arguments', () => {
    expect(parseArgs(['emails.txt']).concurrency).toBe(5);
    expect(parseArgs([]).showHelp).toBe(true);
    expect(parseArgs(['-h']).showHelp).toBe(true);
  });

  it('should reject bad options', () => {
    expect(() => parseArgs(['emails.txt', '--concurrency', '0'])).toThrow(CliUsageError);
    expect(() => parseArgs(['emails.txt', '--concurrency', '51'])).toThrow(
      '--concurrency must be an integer between 1 and 50'
    );
    expect(() => parseArgs(['emails.txt', '--out'])).toThrow('Missing value for --out');
    expect(() => parseArgs(['emails.txt', '--skip-smtp'])).toThrow('Unknown option: --skip-smtp');
  });
});

describe('parseEmailList', () => {
  it('should drop blank lines and comments', () => {
    expect(parseEmailList('# list\r\n a@example.com \n\nb@example.com\n#c@example.com\n')).toEqual([
      'a@example.com',
      'b@example.com',
    ]);
  });
});

describe('formatResultsTable', () => {
  it('should print one row per result and the verdict counts', () => {
    const table = formatResultsTable([
      result('a@example.com', Verdict.SAFE, 'Email verification passed all checks'),
      result('b@mailinator.com', Verdict.RISKY, 'Risky: disposable email address'),
    ]).split('\n');

    expect(table).toHaveLength(6);
    expect(table[0]).toBe(`${'Email'.padEnd(32)} | ${'Verdict'.padEnd(8)} | Reason`);
    expect(table[2]).toBe(`${'a@example.com'.padEnd(32)} | ${'safe'.padEnd(8)} | Email verification passed all checks`);
    expect(table[5]).toBe('Total: 2 (safe: 1, risky: 1, invalid: 0, unknown: 0)');
  });

  it('should shorten long addresses', () => {
    const [, , row] = formatResultsTable([
      result(`${'x'.repeat(40)}@example.com`, Verdict.UNKNOWN, 'Unknown: SMTP connection timed out after 8s'),
    ]).split('\n');

    expect(row.startsWith(`${'x'.repeat(29)}... | `)).toBe(true);
  });
});

describe('main', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should fail on usage errors', async () => {
    await expect(main(['emails.txt', '--bogus'])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('Error: Unknown option: --bogus');
  });

  it('should fail when the file does not exist', async () => {
    await expect(main(['does-not-exist.txt'])).resolves.toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('Error: File not found: does-not-exist.txt');
  });
});
