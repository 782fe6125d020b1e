export * from './result';
export * from './deployment';
