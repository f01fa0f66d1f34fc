export * from './grid';
export * from './physics';
export * from './presets';
export * from './terrain';
export * from './types';
export * from './water';
