export const name = '@leakscan/scanner';

export * from './types';
export * from './ignore';
export * from './enumerator';
export * from './rules';
export * from './line-scanner';
export * from './coordinator';
