// lib/cli.ts
// Renders a day range to an animated GIF: tsx lib/cli.ts [preset] [speed] [out.gif] [seed]

import { DAY_RANGE_PRESETS, parseSpeed, type DayRangePreset } from './cardio/animation';
import { RenderSession } from './cardio/session';
import { DEFAULT_GIF_FILE_NAME, GifFileSink } from './raster/gif';

function isPreset(v: string): v is DayRangePreset {
  return Object.prototype.hasOwnProperty.call(DAY_RANGE_PRESETS, v);
}

async function main(argv: string[]): Promise<void> {
  const [presetArg = 'all', speedArg = 'medium', out = DEFAULT_GIF_FILE_NAME, seed] = argv;
  if (!isPreset(presetArg)) {
    throw new RangeError(`unknown day range '${presetArg}', expected one of ${Object.keys(DAY_RANGE_PRESETS).join(', ')}`);
  }

  const session = new RenderSession({ seed, config: { verbose: true } });
  const artifact = session.generate({ dayRange: DAY_RANGE_PRESETS[presetArg], speed: parseSpeed(speedArg) });
  await new GifFileSink(out).write(artifact);
  console.info(`[cli] wrote ${artifact.frames.length} frames @ ${artifact.frameDurationMs}ms to ${out}`);
}

main(process.argv.slice(2)).catch((e: unknown) => {
  console.error('[cli]', e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
