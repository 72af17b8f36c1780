export * from './document-text';
