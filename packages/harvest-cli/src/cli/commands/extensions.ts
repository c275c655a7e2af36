/**
 * textharvest extensions command
 */

import { DEFAULT_EXTENSIONS, EXTENSION_PRESETS, getExtensionPreset } from '@textharvest/core';
import { reportFailure } from '../failure';
import { ExtensionsInputSchema, parseInput } from '../schemas';
import type { CommandModule } from '../types';
import { box, keyValue } from '../utils';

export const run: CommandModule['run'] = async (ctx, _argv, flags) => {
  const jsonMode = flags.json === true;

  try {
    const input = parseInput(ExtensionsInputSchema, flags);
    const name = input.preset ?? 'default';
    const extensions = input.preset ? getExtensionPreset(input.preset) : [...DEFAULT_EXTENSIONS];

    if (jsonMode) {
      ctx.presenter.json({ ok: true, preset: name, extensions, presets: Object.keys(EXTENSION_PRESETS) });
      return 0;
    }

    ctx.presenter.write(
      box('Supported Extensions', [
        keyValue('Preset', name),
        keyValue('Count', extensions.length),
        '',
        extensions.join(', '),
        '',
        keyValue('Presets', Object.keys(EXTENSION_PRESETS).join(', ')),
      ])
    );
    return 0;
  } catch (error) {
    return reportFailure(ctx, error, { jsonMode, quiet: false, timing: 0 });
  }
};
