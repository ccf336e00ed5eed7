export * from './adapters/adapter';
export * from './adapters/clientAdapter';
export * from './adapters/formats';
export * from './adapters/jsonKeys';
export * from './adapters/primaryAdapter';
export * from './commands';
export * from './defaults';
export * from './documentController';
export * from './editSession';
export * from './invariants';
export * from './mutations';
export * from './validation';
