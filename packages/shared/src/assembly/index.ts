export * from './page-filter';
export * from './plan';
export * from './outline';
export * from './manifest';
export * from './assembler';
