import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { run } from '../cli/commands/extensions';
import { createTestContext, writtenLines } from './helpers';

describe('extensions command', () => {
  beforeEach(() => {
    vi.stubEnv('NO_COLOR', '1');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should list the default extensions', async () => {
    const { ctx, presenter } = createTestContext('/tmp');

    expect(await run(ctx, [], { json: true })).toBe(0);

    const output = presenter.json.mock.calls[0]?.[0];
    expect(output).toMatchObject({ ok: true, preset: 'default', presets: ['code', 'web', 'all'] });
    expect(output.extensions).toHaveLength(29);
    expect(output.extensions.slice(0, 3)).toEqual(['.csv', '.erb', '.erh']);
  });

  it('should list a preset', async () => {
    const { ctx, presenter } = createTestContext('/tmp');

    await run(ctx, [], { json: true, preset: 'web' });

    expect(presenter.json).toHaveBeenCalledWith(
      expect.objectContaining({
        preset: 'web',
        extensions: ['.html', '.css', '.js', '.ts', '.jsx', '.tsx', '.json', '.xml'],
      })
    );
  });

  it('should print a box in text mode', async () => {
    const { ctx, presenter } = createTestContext('/tmp');

    await run(ctx, [], { preset: 'code' });

    expect(writtenLines(presenter.write)).toEqual([
      '│ Supported Extensions',
      '│ Preset: code',
      '│ Count: 7',
      '│',
      '│ .py, .cpp, .c, .h, .hpp, .cs, .java',
      '│',
      '│ Presets: code, web, all',
      '│',
    ]);
  });

  it('should reject an unknown preset', async () => {
    const { ctx } = createTestContext('/tmp');
    expect(await run(ctx, [], { preset: 'bogus' })).toBe(2);
  });
});
