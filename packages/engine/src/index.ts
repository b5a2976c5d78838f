export * from './data/path';
export * from './data/model';

export * from './execution/bindings';
export * from './execution/context';

export type * from './functions/contracts';
export * from './functions/define';
export * from './functions/registry';
export * from './functions/basic';
export { formatDatePattern } from './functions/format-date';
export { interpolate } from './functions/format-string';
