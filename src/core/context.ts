import type { EmitConfig } from '../css/types';
import type { NamePool } from '../css/names';
import type { StyleLogger } from './logger';

/** What rule generators need from the stylesheet they write into. */
export type StyleContext = {
  config: EmitConfig;
  names: NamePool;
  logger: StyleLogger;
};
