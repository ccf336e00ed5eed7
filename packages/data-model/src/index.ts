export * from './model';
export * from './queries';
export * from './rows';
export * from './schemas/clientConfig';
export * from './schemas/primaryConfig';
