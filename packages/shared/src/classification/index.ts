export * from './roles';
export * from './classifier';
