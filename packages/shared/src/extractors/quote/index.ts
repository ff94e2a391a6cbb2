export * from './patterns';
export * from './parser';
