export * from './patterns';
export * from './build-context';
export * from './tag-extractor';
