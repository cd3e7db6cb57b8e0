import { FilterBuilder, Relation } from 'push-segment-filters';
import type { FilterBuilderOptions } from 'push-segment-filters';
import { InvalidPresetParamsError, PresetNotFoundError } from '../../domain/errors.js';

export interface PresetParams {
  radius?: number;
  lat?: number;
  long?: number;
}

type PresetRecipe = (builder: FilterBuilder, params: PresetParams) => FilterBuilder;

const ONE_WEEK_HOURS = 7 * 24;
const ONE_HOUR_SECONDS = 60 * 60;

const PRESETS = {
  'lapsed-users': (b) => b.lastSession(Relation.GreaterThan, ONE_WEEK_HOURS),

  'engaged-users': (b) => b
    .sessionCount(Relation.GreaterThan, 10)
    .and()
    .sessionTime(Relation.GreaterThan, ONE_HOUR_SECONDS),

  'big-spenders': (b) => b
    .amountSpent(Relation.GreaterThan, 100)
    .or()
    .tag('vip', Relation.Exists, ''),

  nearby: (b, { radius, lat, long }) => {
    if (radius === undefined || lat === undefined || long === undefined) {
      throw new InvalidPresetParamsError('nearby requires radius, lat and long');
    }
    return b.location(radius, lat, long);
  },
} satisfies Record<string, PresetRecipe>;

export type PresetName = keyof typeof PRESETS;

export const PRESET_NAMES: readonly string[] = Object.freeze(Object.keys(PRESETS));

function isPresetName(name: string): name is PresetName {
  return Object.hasOwn(PRESETS, name);
}

export function buildPreset(
  name: string,
  params: PresetParams = {},
  options: FilterBuilderOptions = {},
): FilterBuilder {
  if (!isPresetName(name)) {
    throw new PresetNotFoundError(`Preset '${name}' not found; known presets: ${PRESET_NAMES.join(', ')}`);
  }
  const recipe: PresetRecipe = PRESETS[name];
  return recipe(new FilterBuilder(options), params);
}
