export * from './contracts';
export * from './result';
export * from './messages';
