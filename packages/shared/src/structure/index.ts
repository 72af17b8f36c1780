export * from './ordering';
export * from './builder';
export * from './serialization';
export * from './retag';
export * from './extract-structure';
