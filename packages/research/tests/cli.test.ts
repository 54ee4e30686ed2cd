/**
 * Tests for CLI option parsing and command dispatch
 */

import { describe, it, expect, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { SymbolResolutionError } from '@research-desk/contracts';
import {
  buildProgram,
  main,
  parseAsOf,
  parseFormat,
  parseLogLevel,
  runResearchCommand,
  type CommandRunner,
  type RunContext,
} from '../src/cli/program.js';
import {
  FakeFundamentalsProvider,
  FakePriceProvider,
  TEST_BENCHMARKS,
  captureStream,
  rampBars,
  sampleFundamentals,
  silentLogger,
} from './helpers.js';

describe('option parsers', () => {
  it('should parse an as-of date to the end of that UTC day', () => {
    expect(parseAsOf('2024-03-13').toISOString()).toBe('2024-03-13T23:59:59.999Z');
  });

  it('should reject malformed or impossible dates', () => {
    expect(() => parseAsOf('03/13/2024')).toThrow(InvalidArgumentError);
    expect(() => parseAsOf('2024-02-30')).toThrow('Not a calendar date: 2024-02-30.');
  });

  it('should validate format and log level', () => {
    expect(parseFormat('markdown')).toBe('markdown');
    expect(() => parseFormat('pdf')).toThrow(InvalidArgumentError);
    expect(parseLogLevel('debug')).toBe('debug');
    expect(() => parseLogLevel('trace')).toThrow(InvalidArgumentError);
  });
});

describe('buildProgram', () => {
  function programWithSpy() {
    const run = vi.fn<CommandRunner>(async () => undefined);
    const program = buildProgram(run).exitOverride();
    return { run, program };
  }

  it('should dispatch a subcommand with global options', async () => {
    const { run, program } = programWithSpy();

    await program.parseAsync(
      ['technical', 'acme', '--format', 'json', '--as-of', '2024-03-13', '--out', '/tmp/out'],
      { from: 'user' }
    );

    expect(run).toHaveBeenCalledTimes(1);
    const [name, ticker, options] = run.mock.calls[0] ?? [];
    expect(name).toBe('technical');
    expect(ticker).toBe('acme');
    expect(options).toMatchObject({ format: 'json', out: '/tmp/out', verbose: false });
    expect(options?.asOf?.toISOString()).toBe('2024-03-13T23:59:59.999Z');
  });

  it('should accept command aliases and the verbose flag', async () => {
    const { run, program } = programWithSpy();

    await program.parseAsync(['-v', 'fund', 'MSFT'], { from: 'user' });

    expect(run.mock.calls[0]?.[0]).toBe('fundamental');
    expect(run.mock.calls[0]?.[2]).toMatchObject({ verbose: true });
  });

  it('should reject an invalid format', async () => {
    const { run, program } = programWithSpy();
    program.configureOutput({ writeErr: () => undefined });

    await expect(program.parseAsync(['technical', 'ACME', '--format', 'pdf'], { from: 'user' })).rejects.toThrow();
    expect(run).not.toHaveBeenCalled();
  });
});

function testContext(overrides: Partial<RunContext> = {}) {
  const stdout = captureStream();
  const stderr = captureStream();
  const context: RunContext = {
    env: { NODE_ENV: 'test' },
    stdout: stdout.stream,
    stderr: stderr.stream,
    logger: silentLogger(),
    services: {
      priceProvider: new FakePriceProvider(rampBars(30)),
      fundamentalsProvider: new FakeFundamentalsProvider(sampleFundamentals()),
      benchmarks: TEST_BENCHMARKS,
    },
    ...overrides,
  };
  return { context, stdout, stderr };
}

describe('runResearchCommand', () => {
  it('should print the report and exit 0', async () => {
    const { context, stdout, stderr } = testContext();

    const code = await runResearchCommand('fundamental', 'acme', {}, context);

    expect(code).toBe(0);
    expect(stdout.text().split('\n')[0]).toBe('Ticker: ACME');
    expect(stdout.text().endsWith('\n')).toBe(true);
    expect(stderr.text()).toBe('');
  });

  it('should use the configured report format', async () => {
    const { context, stdout } = testContext({ env: { REPORT_FORMAT: 'markdown' } });

    await runResearchCommand('technical', 'ACME', {}, context);

    expect(stdout.text().split('\n')[0]).toBe('# Technical Analysis: ACME');
  });

  it('should print a formatted error and exit 1 on failure', async () => {
    const { context, stdout, stderr } = testContext();
    const unknown = new SymbolResolutionError('Ticker "ZZZZ" not found', { ticker: 'ZZZZ', provider: 'yahoo' });
    context.services = {
      priceProvider: new FakePriceProvider(unknown),
      fundamentalsProvider: new FakeFundamentalsProvider(unknown),
    };

    const code = await runResearchCommand('technical', 'ZZZZ', {}, context);

    expect(code).toBe(1);
    expect(stdout.text()).toBe('');
    expect(stderr.text()).toContain('Code: INVALID_ARGS');
    expect(stderr.text()).toContain('Reason: Ticker "ZZZZ" not found');
  });

  it('should exit 1 on invalid configuration', async () => {
    const { context, stderr } = testContext({ env: { PROVIDER_TIMEOUT: 'soon' } });

    const code = await runResearchCommand('technical', 'ACME', {}, context);

    expect(code).toBe(1);
    expect(stderr.text()).toContain('Configuration validation failed:');
  });

  it('should detach the global handlers afterwards', async () => {
    const { context } = testContext();
    const before = process.listenerCount('uncaughtException');

    await runResearchCommand('technical', 'ACME', {}, context);

    expect(process.listenerCount('uncaughtException')).toBe(before);
  });
});

describe('main', () => {
  it('should parse argv and return the exit code', async () => {
    const { context, stdout } = testContext();

    const code = await main(['node', 'research-desk', 'technical', 'ACME', '--format', 'json'], context);

    expect(code).toBe(0);
    expect(JSON.parse(stdout.text())).toMatchObject({ ticker: 'ACME', barsAnalyzed: 30 });
  });
});
