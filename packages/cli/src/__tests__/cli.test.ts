/**
 * Tests for the lifeguard command line
 */

import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildProgram } from '../cli';
import { DEMO_FILES } from '../demo';

describe('lifeguard demo', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lifeguard-cli-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  test('should run the walkthrough in the given directory', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    buildProgram().parse(['demo', '--dir', dir, '--no-color'], { from: 'user' });

    expect(existsSync(join(dir, DEMO_FILES.data))).toBe(true);
    expect(existsSync(join(dir, DEMO_FILES.log))).toBe(true);
    expect(existsSync(join(dir, DEMO_FILES.temporary))).toBe(true);
    expect(log).toHaveBeenLastCalledWith(expect.stringContaining('Done: 3 queries, 0 live resources left'));
    expect(process.exitCode).toBeUndefined();
  });

  test('should fail with a configuration error for an unknown log level', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    buildProgram().parse(['demo', '--dir', dir, '--log-level', 'loud'], { from: 'user' });

    expect(error).toHaveBeenCalledWith(expect.stringContaining(
      '[8000] configuration: Invalid configuration: logLevel: Log level must be error, warn, info, debug or trace'
    ));
    expect(process.exitCode).toBe(1);
    expect(existsSync(join(dir, DEMO_FILES.data))).toBe(false);
  });

  test('should describe the demo command', () => {
    const demo = buildProgram().commands.find(command => command.name() === 'demo');

    expect(demo?.description()).toBe('Acquire, use and release files and a simulated connection');
    expect(demo?.options.map(option => option.long)).toEqual(['--dir', '--log-level', '--no-color']);
  });
});
