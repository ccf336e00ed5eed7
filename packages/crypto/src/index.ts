export * from './keyMaterial';
export * from './primitives';
export * from './provider';
