export * from './trends';
export * from './context';
export * from './analysis';
