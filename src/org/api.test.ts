import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { OrgConversationsConfig } from '../config.js';
import { buildDocument, importTranscripts, parseDailiesDirectory, parseOrgFile } from './api.js';
import { buildOrgDocument } from './build.js';
import { parseOrgDocument } from './parse.js';
import { sha256Hex } from './storage.js';

vi.mock('./parse.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./parse.js')>();
  return { ...actual, parseOrgDocument: vi.fn(actual.parseOrgDocument) };
});

let root: string;
let config: OrgConversationsConfig;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'org-conversations-'));
  config = { rootDir: root, dailiesDir: 'dailies' };
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

async function writeDaily(name: string, topic: string, answer: string): Promise<string> {
  const { text } = buildOrgDocument([
    {
      topic,
      messages: [
        { role: 'user', content: `Question about ${topic}` },
        { role: 'assistant', content: answer },
      ],
    },
  ]);
  await mkdir(join(root, 'dailies'), { recursive: true });
  await writeFile(join(root, 'dailies', name), text, 'utf8');
  return text;
}

describe('parseOrgFile', () => {
  it('parses a daily file and dates it from the file name', async () => {
    const text = await writeDaily('2024-03-15.org', 'Standup', 'Ship the parser.');
    const parsed = await parseOrgFile(config, { path: 'dailies/2024-03-15.org' });

    expect(parsed.path).toBe('dailies/2024-03-15.org');
    expect(parsed.etag).toBe(sha256Hex(text));
    expect(parsed.warnings).toEqual([]);
    expect(parsed.conversations).toHaveLength(1);

    const [conversation] = parsed.conversations;
    expect(conversation).toMatchObject({
      sourcePath: 'dailies/2024-03-15.org',
      date: '2024-03-15',
      topic: 'Standup',
    });
    expect(conversation?.messages.map((m) => m.role)).toEqual(['user', 'assistant']);
    expect(conversation?.messages[1]?.content).toBe('Ship the parser.');
  });

  it('attaches the file path to warnings', async () => {
    await mkdir(join(root, 'dailies'), { recursive: true });
    await writeFile(
      join(root, 'dailies', 'broken.org'),
      ':PROPERTIES:\n:GPTEL_BOUNDS: ((response (5 900)))\n:END:\n* Short\n',
      'utf8'
    );
    const parsed = await parseOrgFile(config, { path: 'dailies/broken.org' });

    expect(parsed.conversations).toEqual([]);
    expect(parsed.warnings).toEqual([
      {
        severity: 'warning',
        code: 'BOUNDS_OUT_OF_RANGE',
        message: 'Skipped 1 bounds pair(s) outside the document: (5 900)',
        path: 'dailies/broken.org',
      },
    ]);
  });

  it('refuses paths outside the root', async () => {
    await expect(parseOrgFile(config, { path: '../outside.org' })).rejects.toThrow(
      'Resolved path escapes rootDir'
    );
  });
});

describe('parseDailiesDirectory', () => {
  it('parses .org files in name order and keeps going after a failure', async () => {
    await writeDaily('2024-03-16.org', 'Later', 'Second day.');
    await writeDaily('2024-03-14.org', 'Broken', 'Never read.');
    await writeDaily('2024-03-15.org', 'Earlier', 'First day.');
    await writeFile(join(root, 'dailies', 'readme.txt'), 'not org', 'utf8');

    vi.mocked(parseOrgDocument).mockImplementationOnce(() => {
      throw new Error('boom');
    });

    const parsed = await parseDailiesDirectory(config);

    expect(parsed.files).toBe(3);
    expect(parsed.errors).toEqual([
      { severity: 'error', code: 'PARSE_FAILED', message: 'boom', path: 'dailies/2024-03-14.org' },
    ]);
    expect(parsed.conversations.map((c) => [c.date, c.topic])).toEqual([
      ['2024-03-15', 'Earlier'],
      ['2024-03-16', 'Later'],
    ]);
  });

  it('returns an empty result for a missing directory', async () => {
    expect(await parseDailiesDirectory(config, { dir: 'nowhere' })).toEqual({
      files: 0,
      conversations: [],
      errors: [],
      warnings: [],
    });
  });
});

describe('buildDocument', () => {
  it('validates conversations before building', () => {
    expect(() => buildDocument({ conversations: [{ topic: 1, messages: [] }] })).toThrow(
      /^Invalid conversations: 0\.topic: /
    );
  });

  it('builds valid conversations', () => {
    const built = buildDocument({
      conversations: [{ topic: 'T', messages: [{ role: 'assistant', content: 'Hi' }] }],
    });
    expect(built.converged).toBe(true);
    expect(built.bounds).toHaveLength(1);
  });
});

describe('importTranscripts', () => {
  const entries = [
    {
      date: '1/8/25, 10:16 PM',
      conversation: 'Question:\nWhat is Org?\nAI Response:\nAn **outliner**.\n',
    },
  ];

  it('writes one file per day', async () => {
    const imported = await importTranscripts(config, { entries });

    expect(imported).toEqual({
      files: [
        {
          date: '2025-01-08',
          path: 'dailies/2025-01-08.org',
          conversations: 1,
          responses: 1,
          written: true,
        },
      ],
      errors: [],
      warnings: [],
    });

    const text = await readFile(join(root, 'dailies', '2025-01-08.org'), 'utf8');
    const { conversations } = parseOrgDocument(text, { sourcePath: 'dailies/2025-01-08.org' });
    expect(conversations).toHaveLength(1);
    expect(conversations[0]?.topic).toBe('What is Org?');
    expect(conversations[0]?.date).toBe('2025-01-08');
    expect(conversations[0]?.messages[1]).toMatchObject({
      role: 'assistant',
      content: 'An *outliner*.',
    });
  });

  it('reports existing files unless overwrite is set', async () => {
    await importTranscripts(config, { entries });

    const again = await importTranscripts(config, { entries });
    expect(again.files[0]?.written).toBe(false);
    expect(again.errors).toEqual([
      {
        severity: 'error',
        code: 'FILE_EXISTS',
        message: 'File already exists: dailies/2025-01-08.org',
        path: 'dailies/2025-01-08.org',
      },
    ]);

    const replaced = await importTranscripts(config, { entries, overwrite: true });
    expect(replaced.files[0]?.written).toBe(true);
    expect(replaced.errors).toEqual([]);
  });

  it('writes nothing on a dry run', async () => {
    const imported = await importTranscripts(config, { entries, outDir: 'preview', dryRun: true });

    expect(imported.files).toEqual([
      {
        date: '2025-01-08',
        path: 'preview/2025-01-08.org',
        conversations: 1,
        responses: 1,
        written: false,
      },
    ]);
    await expect(access(join(root, 'preview'))).rejects.toThrow();
  });

  it('passes skipped entries through as warnings', async () => {
    const imported = await importTranscripts(config, {
      entries: [{ date: 'someday', conversation: 'Question:\nHi\n' }],
      dryRun: true,
    });
    expect(imported.files).toEqual([]);
    expect(imported.warnings.map((w) => w.code)).toEqual(['INVALID_DATE']);
  });

  it('rejects payloads that are not an export', async () => {
    await expect(importTranscripts(config, { entries: { nope: 1 } })).rejects.toThrow(
      /^Invalid transcript export: \(root\): /
    );
  });
});
