import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { CommanderError, type Command } from 'commander';
import { createProgram } from '../src/cli.js';

describe('CLI option parsing', () => {
  let tempDir: string;
  let indir: string;
  let outdir: string;
  let stderr: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fits-archiver-cli-'));
    indir = path.join(tempDir, 'in');
    outdir = path.join(tempDir, 'out');
    fs.mkdirSync(indir);
    fs.mkdirSync(outdir);
    stderr = '';
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function program(): Command {
    return createProgram()
      .exitOverride()
      .configureOutput({
        writeOut: () => undefined,
        writeErr: (text) => {
          stderr += text;
        },
      });
  }

  async function parseError(args: string[]): Promise<CommanderError> {
    const failure = await program()
      .parseAsync(args, { from: 'user' })
      .then(() => null, (error: unknown) => error);
    if (!(failure instanceof CommanderError)) {
      throw new Error(`expected a usage error for ${args.join(' ')}`);
    }
    return failure;
  }

  it('builds a frozen config with defaults', async () => {
    const cli = program();
    await cli.parseAsync(['-i', indir, '-o', outdir], { from: 'user' });

    expect(cli.watchConfig).toEqual({
      sourceDirectory: indir,
      destinationRoot: outdir,
      verbose: false,
      pollIntervalMs: 1000,
      native: false,
    });
    expect(Object.isFrozen(cli.watchConfig)).toBe(true);
  });

  it('accepts the long flags', async () => {
    const cli = program();
    await cli.parseAsync(
      ['--indir', indir, '--outdir', outdir, '--verbose', '--native', '--interval', '250'],
      { from: 'user' }
    );

    expect(cli.watchConfig).toEqual({
      sourceDirectory: indir,
      destinationRoot: outdir,
      verbose: true,
      pollIntervalMs: 250,
      native: true,
    });
  });

  it('resolves relative directories against the working directory', async () => {
    const originalCwd = process.cwd();
    process.chdir(tempDir);
    try {
      const cli = program();
      await cli.parseAsync(['-i', 'in', '-o', 'out'], { from: 'user' });

      expect(cli.watchConfig?.sourceDirectory).toBe(path.resolve('in'));
      expect(cli.watchConfig?.destinationRoot).toBe(path.resolve('out'));
    } finally {
      process.chdir(originalCwd);
    }
  });

  it('fails without --indir', async () => {
    const error = await parseError(['-o', outdir]);

    expect(error.code).toBe('commander.missingMandatoryOptionValue');
    expect(error.exitCode).toBe(1);
    expect(stderr).toContain('--indir <path>');
  });

  it('fails without --outdir', async () => {
    const error = await parseError(['-i', indir]);

    expect(error.code).toBe('commander.missingMandatoryOptionValue');
    expect(stderr).toContain('--outdir <path>');
  });

  it('fails on a nonexistent input directory', async () => {
    const missing = path.join(tempDir, 'missing');
    const error = await parseError(['-i', missing, '-o', outdir]);

    expect(error.code).toBe('commander.invalidArgument');
    expect(stderr).toContain(`Input directory does not exist: ${missing}`);
  });

  it('fails when the output path is a file', async () => {
    const file = path.join(tempDir, 'file.txt');
    fs.writeFileSync(file, '');
    const error = await parseError(['-i', indir, '-o', file]);

    expect(error.code).toBe('commander.invalidArgument');
    expect(stderr).toContain(`Output path is not a directory: ${file}`);
  });

  it('rejects positional arguments', async () => {
    const error = await parseError(['-i', indir, '-o', outdir, 'extra']);

    expect(error.code).toBe('commander.excessArguments');
  });

  it('rejects a non-positive interval', async () => {
    const error = await parseError(['-i', indir, '-o', outdir, '--interval', '0']);

    expect(error.code).toBe('commander.invalidArgument');
    expect(stderr).toContain("Invalid interval '0'");
  });
});
