import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { describeUnreadyFiles, getReadiness, makeFsFileProbe } from '@/modules/health/index.js';

import { makeFakeFileProbe } from '../../fixtures/fakes.js';

import type { SourceFile } from '@/modules/health/index.js';

const files: SourceFile[] = [
  { kind: 'config', path: 'config/donations.yaml' },
  { kind: 'facility', path: '/data/facility.csv' },
  { kind: 'region', path: '/data/state.csv' },
];

const input = { uptime: 42, timestamp: '2024-01-01T00:00:00.000Z' };

describe('getReadiness', () => {
  it('is ok when every source file is readable', async () => {
    const result = await getReadiness(
      { probe: makeFakeFileProbe(), files, version: '0.1.0' },
      input
    );

    expect(result).toEqual({
      status: 'ok',
      timestamp: '2024-01-01T00:00:00.000Z',
      uptime: 42,
      version: '0.1.0',
      files: [
        { kind: 'config', path: 'config/donations.yaml', state: 'readable' },
        { kind: 'facility', path: '/data/facility.csv', state: 'readable' },
        { kind: 'region', path: '/data/state.csv', state: 'readable' },
      ],
    });
  });

  it('names each dataset file that cannot be loaded', async () => {
    const result = await getReadiness(
      {
        probe: makeFakeFileProbe({ '/data/facility.csv': 'empty', '/data/state.csv': 'missing' }),
        files,
      },
      input
    );

    expect(result.status).toBe('unhealthy');
    expect(result.message).toBe(
      'facility dataset is empty (/data/facility.csv); region dataset is missing (/data/state.csv)'
    );
  });

  it('records a rejecting probe as unreadable', async () => {
    const result = await getReadiness(
      {
        probe: makeFakeFileProbe({ 'config/donations.yaml': new Error('EIO') }),
        files,
      },
      input
    );

    expect(result.status).toBe('unhealthy');
    expect(result.files[0]).toEqual({
      kind: 'config',
      path: 'config/donations.yaml',
      state: 'unreadable',
    });
    expect(result.message).toBe('donation config is unreadable (config/donations.yaml)');
  });

  it('is ok with no files to check', async () => {
    const result = await getReadiness({ probe: makeFakeFileProbe(), files: [] }, input);

    expect(result.status).toBe('ok');
    expect(result.message).toBeUndefined();
  });
});

describe('describeUnreadyFiles', () => {
  it('is undefined when all files are readable', () => {
    expect(
      describeUnreadyFiles([{ kind: 'region', path: '/data/state.csv', state: 'readable' }])
    ).toBeUndefined();
  });
});

describe('makeFsFileProbe', () => {
  const probe = makeFsFileProbe();

  it('distinguishes readable, empty and missing files', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'health-'));
    const filled = path.join(dir, 'facility.csv');
    const empty = path.join(dir, 'state.csv');
    await writeFile(filled, 'date,hospital,daily\n', 'utf8');
    await writeFile(empty, '', 'utf8');

    expect(await probe(filled)).toBe('readable');
    expect(await probe(empty)).toBe('empty');
    expect(await probe(path.join(dir, 'absent.csv'))).toBe('missing');
  });

  it('treats a directory as unreadable', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'health-'));

    expect(await probe(dir)).toBe('unreadable');
  });
});
