export {
  formatColor,
  hslToColor,
  isColor,
  MAX_CHANNEL,
  mixColors,
  parseColor,
  rgba,
  toColor,
} from './color';
export type { Color } from './color';
