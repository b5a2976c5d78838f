export * from './entities/json';
export * from './entities/component';
export * from './entities/messages';
export * from './entities/chat';
export * from './entities/events';

export type * from './contracts/catalog';
export type * from './contracts/model-adapter';
export * from './contracts/tool';

export type * from './ports/logger';

export * from './config/types';
export * from './config/defaults';
export * from './config/resolve';

export * from './errors';
export * from './utils/assert';
export * from './utils/capabilities';
export * from './utils/logger';
export * from './utils/timeout';
