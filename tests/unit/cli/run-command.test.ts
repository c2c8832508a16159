import { describe, it, expect, vi, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { applySeed, parseRunArgs, parseSeed, runCommand } from '../../../src/cli/commands/run.js';
import { ErrorCode } from '../../../src/core/errors.js';
import { createTestHarness } from '../../fixtures/factories.js';

const SEED_PATH = fileURLToPath(new URL('../../fixtures/seed.json', import.meta.url));

describe('parseRunArgs', () => {
  it('should split the command, its arguments and staged answers', () => {
    expect(parseRunArgs(['wit update', '101', '--input', '1', '-i', 'New title'])).toEqual({
      ok: true,
      value: {
        command: 'wit update',
        args: '101',
        inputs: ['1', 'New title'],
        role: undefined,
        seedPath: undefined,
        summary: false,
      },
    });
  });

  it('should join later positionals into the argument string', () => {
    const result = parseRunArgs(['wit', 'print', '101']);
    expect(result.ok && result.value).toMatchObject({ command: 'wit', args: 'print 101' });
  });

  it('should stop reading options after --', () => {
    const unknown = parseRunArgs(['wit', 'makechildren', '101,102', "--title='Checkout'"]);
    expect(unknown).toEqual({ ok: false, error: "Unknown option: --title='Checkout'" });

    const passed = parseRunArgs(['wit', '--', 'makechildren', '101,102', "--title='Checkout'"]);
    expect(passed.ok && passed.value.args).toBe("makechildren 101,102 --title='Checkout'");
  });

  it('should accept answers that look like options', () => {
    const result = parseRunArgs(['wit update 101', '--input', '-1']);
    expect(result.ok && result.value.inputs).toEqual(['-1']);
  });

  it('should read role, seed and summary options', () => {
    const result = parseRunArgs(['wit list', '--role', 'lead', '--seed', 'items.json', '--summary']);

    expect(result.ok && result.value).toMatchObject({ role: 'lead', seedPath: 'items.json', summary: true });
  });

  it('should reject missing values and a missing command', () => {
    expect(parseRunArgs(['wit list', '--input'])).toEqual({ ok: false, error: '--input requires a value' });
    expect(parseRunArgs(['wit list', '--seed'])).toEqual({ ok: false, error: '--seed requires a path' });
    expect(parseRunArgs([]).ok).toBe(false);
  });
});

describe('parseSeed', () => {
  it('should validate the seed file shape', () => {
    const result = parseSeed(readFileSync(SEED_PATH, 'utf8'));
    if (!result.ok) throw result.error;

    expect(result.value.workItems).toHaveLength(3);
    expect(result.value.flags).toEqual(['beta']);
  });

  it('should default missing sections', () => {
    expect(parseSeed('{}')).toEqual({ ok: true, value: { workItems: [], flags: [] } });
  });

  it('should reject malformed JSON and unknown enum values', () => {
    const broken = parseSeed('{', 'broken.json');
    expect(!broken.ok && broken.error.code).toBe(ErrorCode.INVALID_SEED);

    const wrong = parseSeed('{"workItems":[{"id":"1","title":"x","priority":"URGENT"}]}', 'wrong.json');
    expect(!wrong.ok && wrong.error.message.startsWith('Invalid seed wrong.json: workItems.0.priority:')).toBe(true);
  });
});

describe('applySeed', () => {
  it('should load items, metadata and flags into a context', () => {
    const seed = parseSeed(readFileSync(SEED_PATH, 'utf8'));
    if (!seed.ok) throw seed.error;
    const { context } = createTestHarness();

    applySeed(context, seed.value);

    expect(context.getWorkItem('payment')?.id).toBe('102');
    expect(context.getWorkItemMetadata('101', 'component')).toBe('web');
    expect(context.getFlag('beta')).toBe(true);
  });
});

describe('runCommand', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should replay a seeded command and echo the captured channels', () => {
    const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const errOut = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const result = runCommand({
      command: 'wit list',
      args: 'pretty',
      inputs: [],
      seedPath: SEED_PATH,
      summary: false,
    });

    expect(result).toEqual({ ok: true, value: 0 });
    expect(out).toHaveBeenCalledWith('Checkout epic\n  ├── Cart page\n  └── Payment form\n');
    expect(errOut).toHaveBeenCalledWith('');
  });

  it('should return the exit code of a failing command', () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const errOut = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const result = runCommand({ command: 'wit update', args: '999', inputs: ['1'], summary: false });

    expect(result).toEqual({ ok: true, value: 1 });
    expect(errOut).toHaveBeenCalledWith('Error: Work item not found: 999\n');
  });

  it('should report an unreadable seed file', () => {
    const result = runCommand({
      command: 'wit list',
      args: '',
      inputs: [],
      seedPath: fileURLToPath(new URL('../../fixtures/missing.json', import.meta.url)),
      summary: false,
    });

    expect(!result.ok && result.error.code).toBe(ErrorCode.INVALID_SEED);
  });
});
