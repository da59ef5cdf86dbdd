import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { closeLogger, createSilentLogger, getLogFilePath, makeLogger } from './index';

const tempDirs: string[] = [];

afterEach(async () => {
  await closeLogger('logger-test');
  await closeLogger('logger-file-test');
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('logger', () => {
  it('caches loggers by name', () => {
    const first = makeLogger('logger-test', { level: 'silent' });
    const second = makeLogger('logger-test', { level: 'debug' });
    expect(second).toBe(first);
    expect(first.level).toBe('silent');
    expect(getLogFilePath('logger-test')).toBeNull();
  });

  it('opens a per-run file when a log directory is configured', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'skyclimb-logs-'));
    tempDirs.push(dir);
    makeLogger('logger-file-test', { level: 'silent', logDir: dir });

    const filePath = getLogFilePath('logger-file-test');
    expect(filePath).not.toBeNull();
    expect(path.dirname(filePath ?? '')).toBe(path.join(dir, 'logger-file-test'));
    expect(path.basename(filePath ?? '')).toMatch(/^run-.*\.log$/);
  });

  it('forgets loggers once closed', async () => {
    const first = makeLogger('logger-test', { level: 'silent' });
    await closeLogger('logger-test');
    const second = makeLogger('logger-test', { level: 'silent' });
    expect(second).not.toBe(first);
  });

  it('creates disabled loggers for library defaults', () => {
    const logger = createSilentLogger();
    expect(logger.isLevelEnabled('fatal')).toBe(false);
  });
});
