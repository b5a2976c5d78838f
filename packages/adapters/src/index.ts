export * from './logger/pino';
export * from './logger/fake';
export * from './llm/fake';
export * from './openai/model-adapter';
