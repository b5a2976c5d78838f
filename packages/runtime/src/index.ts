export * from './surface/surface';
export * from './surface/registry';

export * from './tools/registry';
export * from './tools/surface-tools';

export * from './agent/local-agent';

export * from './conversation/content-generator';
export * from './conversation/conversation';
