import { describe, it, expect, beforeEach, afterEach, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { homedir } from 'os';
import {
  configureLogger,
  createCommandLogger,
  formatEntry,
  getDefaultLogPath,
  getLogPath,
  logFullError,
  logInfo,
} from '../logger';
import { UsageError } from '../errors';
import { cleanupTempDir, createTempDir } from './support/fs-helpers';

const AT = new Date('2024-01-02T03:04:05.000Z');

describe('formatEntry', () => {
  it('should format a bare message', () => {
    expect(formatEntry('INFO', 'hello', undefined, AT)).toBe('[2024-01-02T03:04:05.000Z] [INFO] hello\n');
  });

  it('should indent object data', () => {
    expect(formatEntry('DEBUG', 'state', { a: 1 }, AT)).toBe(
      '[2024-01-02T03:04:05.000Z] [DEBUG] state\n  Data: {\n    "a": 1\n  }\n'
    );
  });

  it('should stringify primitives', () => {
    expect(formatEntry('WARN', 'count', 42, AT)).toBe('[2024-01-02T03:04:05.000Z] [WARN] count\n  Data: 42\n');
  });

  it('should include error messages', () => {
    const entry = formatEntry('ERROR', 'failed', new Error('nope'), AT);

    expect(entry.startsWith('[2024-01-02T03:04:05.000Z] [ERROR] failed\n  Error: nope\n  Stack: ')).toBe(true);
  });

  it('should survive unserializable data', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(formatEntry('INFO', 'loop', circular, AT)).toBe(
      '[2024-01-02T03:04:05.000Z] [INFO] loop\n  Data: [Could not serialize]\n'
    );
  });
});

describe('log file', () => {
  let logDir: string;
  let logFile: string;

  beforeEach(async () => {
    logDir = await createTempDir('flask-kickstart-logger');
    logFile = path.join(logDir, 'nested', 'debug.log');
    configureLogger({ logFile });
  });

  afterEach(async () => {
    await cleanupTempDir(logDir);
  });

  afterAll(() => {
    configureLogger({ logFile: null });
  });

  it('should default to the home directory', () => {
    expect(getDefaultLogPath()).toBe(path.join(homedir(), '.flask-kickstart', 'debug.log'));
  });

  it('should write a session header once, then entries', async () => {
    logInfo('first');
    logInfo('second');

    const content = await fs.readFile(logFile, 'utf-8');

    expect(content.match(/session started/g)).toHaveLength(1);
    expect(content).toMatch(/\[INFO\] first\n/);
    expect(content).toMatch(/\[INFO\] second\n$/);
  });

  it('should prefix command loggers', async () => {
    createCommandLogger('create').warn('careful');

    expect(await fs.readFile(logFile, 'utf-8')).toMatch(/\[WARN\] \[create\] careful\n$/);
  });

  it('should record error codes', async () => {
    logFullError('create', new UsageError(), { args: [] });

    const content = await fs.readFile(logFile, 'utf-8');

    expect(content).toContain('[ERROR] Error in create');
    expect(content).toContain('"errorCode": "E_USAGE"');
    expect(content).toContain('"errorName": "UsageError"');
  });

  it('should rotate an oversized log', async () => {
    await fs.mkdir(path.dirname(logFile), { recursive: true });
    await fs.writeFile(logFile, 'x'.repeat(5 * 1024 * 1024 + 1));
    configureLogger({ logFile });

    logInfo('fresh');

    const rotated = await fs.stat(`${logFile}.old`);
    const content = await fs.readFile(logFile, 'utf-8');
    expect(rotated.size).toBe(5 * 1024 * 1024 + 1);
    expect(content).toMatch(/\[INFO\] fresh\n$/);
    expect(content).not.toContain('xxx');
  });

  it('should do nothing when disabled', async () => {
    configureLogger({ logFile: null });

    logInfo('ignored');

    expect(getLogPath()).toBeNull();
    await expect(fs.stat(logFile)).rejects.toThrow();
  });
});
