export * from './ignore-set';
export * from './loader';
