export * from './table';
export * from './formats';
export * from './renderer';
